/**
 * Import extraction for Python and TypeScript/JavaScript syntax trees.
 */
import type Parser from "tree-sitter";

import type { ImportReference, LanguageId } from "../../core/model.js";
import { resolvePythonModule, resolveScriptSpecifier } from "../../core/moduleNames.js";

/**
 * Find every import in a tree, nested ones (inside functions or blocks) included.
 *
 * @param file - Root-relative path of the importing file, used to resolve relative imports
 */
export function findImports(
  root: Parser.SyntaxNode,
  language: LanguageId,
  file: string
): ImportReference[] {
  const imports: ImportReference[] = [];
  const visit = language === "python" ? visitPython : visitScript;
  visit(root, file, imports);
  return imports;
}

function reference(segments: string[] | null, node: Parser.SyntaxNode): ImportReference | null {
  if (!segments || segments.length === 0) return null;
  return {
    name: segments.join("."),
    segments,
    line: node.startPosition.row + 1,
  };
}

function push(imports: ImportReference[], ref: ImportReference | null): void {
  if (ref) imports.push(ref);
}

function dottedSegments(text: string): string[] {
  return text.split(".").map((s) => s.trim()).filter((s) => s.length > 0);
}

function visitPython(node: Parser.SyntaxNode, file: string, imports: ImportReference[]): void {
  switch (node.type) {
    case "import_statement":
      // import a.b, c as d
      for (const child of node.namedChildren) {
        const name = child.type === "aliased_import" ? child.childForFieldName("name") : child;
        if (name?.type === "dotted_name") {
          push(imports, reference(dottedSegments(name.text), child));
        }
      }
      return;

    case "import_from_statement": {
      // from a.b import c / from ..x import y / from . import z
      const moduleName = node.childForFieldName("module_name");
      if (!moduleName) return;
      const segments =
        moduleName.type === "relative_import"
          ? resolvePythonModule(moduleName.text, file)
          : dottedSegments(moduleName.text);
      push(imports, reference(segments, node));
      return;
    }

    case "future_import_statement":
      push(imports, reference(["__future__"], node));
      return;

    default:
      for (const child of node.children) {
        visitPython(child, file, imports);
      }
  }
}

/**
 * Text of a string literal without its quotes.
 */
function stringValue(node: Parser.SyntaxNode | null): string | null {
  if (!node || node.type !== "string") return null;
  return node.text.slice(1, -1);
}

function scriptReference(
  specifier: string | null,
  file: string,
  node: Parser.SyntaxNode
): ImportReference | null {
  return specifier === null ? null : reference(resolveScriptSpecifier(specifier, file), node);
}

function visitScript(node: Parser.SyntaxNode, file: string, imports: ImportReference[]): void {
  switch (node.type) {
    case "import_statement": {
      // import x from "m" / import "m" / import x = require("m")
      const requireClause = node.namedChildren.find((c) => c.type === "import_require_clause");
      const source = node.childForFieldName("source") ?? requireClause?.childForFieldName("source") ?? null;
      push(imports, scriptReference(stringValue(source), file, node));
      return;
    }

    case "export_statement": {
      // export { x } from "m" / export * from "m"
      const source = node.childForFieldName("source");
      if (source) {
        push(imports, scriptReference(stringValue(source), file, node));
        return;
      }
      break;
    }

    case "call_expression": {
      // require("m") with a literal argument
      const fn = node.childForFieldName("function");
      const args = node.childForFieldName("arguments");
      if (fn?.type === "identifier" && fn.text === "require" && args?.namedChildCount === 1) {
        push(imports, scriptReference(stringValue(args.namedChildren[0]), file, node));
      }
      break;
    }
  }

  for (const child of node.children) {
    visitScript(child, file, imports);
  }
}
