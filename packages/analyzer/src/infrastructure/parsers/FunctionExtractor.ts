/**
 * Function declaration and call extraction.
 * Calls are attributed to the innermost enclosing named function; calls at
 * module or class level belong to no function and are dropped.
 */
import type Parser from "tree-sitter";

import type { FunctionDeclaration, LanguageId } from "../../core/model.js";

type SyntaxNode = Parser.SyntaxNode;

export function findFunctions(
  root: SyntaxNode,
  language: LanguageId,
  file: string
): FunctionDeclaration[] {
  const functions: FunctionDeclaration[] = [];
  const visit = language === "python" ? visitPython : visitScript;
  visit(root, null, { file, functions });
  return functions;
}

interface WalkState {
  file: string;
  functions: FunctionDeclaration[];
}

function declare(
  state: WalkState,
  node: SyntaxNode,
  name: string,
  params: string[],
  returns: string | null,
  decorators: string[]
): FunctionDeclaration {
  const fn: FunctionDeclaration = {
    name,
    file: state.file,
    params,
    returns,
    line: node.startPosition.row + 1,
    decorators,
    calls: [],
  };
  state.functions.push(fn);
  return fn;
}

function decoratorText(node: SyntaxNode): string {
  return node.text.replace(/^@/, "").trim();
}

// ---------------------------------------------------------------------------
// Python
// ---------------------------------------------------------------------------

function pythonParams(parameters: SyntaxNode | null): string[] {
  const params: string[] = [];
  for (const param of parameters?.namedChildren ?? []) {
    switch (param.type) {
      case "identifier":
        params.push(param.text);
        break;
      case "typed_parameter": {
        // `*args: int` is a typed_parameter around a splat pattern
        const inner = param.namedChildren[0];
        if (inner?.type === "identifier") params.push(inner.text);
        break;
      }
      case "default_parameter":
      case "typed_default_parameter": {
        const name = param.childForFieldName("name");
        if (name) params.push(name.text);
        break;
      }
    }
  }
  return params;
}

function pythonCallee(call: SyntaxNode): string | null {
  const fn = call.childForFieldName("function");
  if (fn?.type === "identifier") return fn.text;
  if (fn?.type === "attribute") return fn.childForFieldName("attribute")?.text ?? null;
  return null;
}

function declarePython(
  node: SyntaxNode,
  decorators: SyntaxNode[],
  state: WalkState
): FunctionDeclaration | null {
  const name = node.childForFieldName("name");
  if (!name) return null;
  return declare(
    state,
    node,
    name.text,
    pythonParams(node.childForFieldName("parameters")),
    node.childForFieldName("return_type")?.text ?? null,
    decorators.map(decoratorText)
  );
}

function visitPython(node: SyntaxNode, current: FunctionDeclaration | null, state: WalkState): void {
  switch (node.type) {
    case "decorated_definition": {
      const definition = node.childForFieldName("definition");
      if (definition?.type === "function_definition") {
        // Decorator expressions are walked inside the function they decorate
        const decorators = node.namedChildren.filter((c) => c.type === "decorator");
        const fn = declarePython(definition, decorators, state) ?? current;
        for (const decorator of decorators) {
          visitPython(decorator, fn, state);
        }
        walkChildren(definition, fn, state, visitPython);
        return;
      }
      break;
    }

    case "function_definition": {
      const fn = declarePython(node, [], state) ?? current;
      walkChildren(node, fn, state, visitPython);
      return;
    }

    case "call": {
      const callee = pythonCallee(node);
      if (current && callee) current.calls.push(callee);
      break;
    }
  }

  walkChildren(node, current, state, visitPython);
}

// ---------------------------------------------------------------------------
// TypeScript / JavaScript
// ---------------------------------------------------------------------------

const FUNCTION_VALUES = new Set([
  "arrow_function",
  "function",
  "function_expression",
  "generator_function",
]);

function scriptParams(fn: SyntaxNode): string[] {
  // `x => ...` has a single `parameter` instead of a parameter list
  const single = fn.childForFieldName("parameter");
  if (single) return [single.text];

  const params: string[] = [];
  for (const param of fn.childForFieldName("parameters")?.namedChildren ?? []) {
    switch (param.type) {
      case "required_parameter":
      case "optional_parameter": {
        const pattern = param.childForFieldName("pattern");
        if (pattern && pattern.type !== "rest_pattern" && pattern.type !== "this") {
          params.push(pattern.text);
        }
        break;
      }
      case "assignment_pattern": {
        const left = param.childForFieldName("left");
        if (left) params.push(left.text);
        break;
      }
      case "identifier":
      case "object_pattern":
      case "array_pattern":
        params.push(param.text);
        break;
    }
  }
  return params;
}

function scriptReturnType(fn: SyntaxNode): string | null {
  const annotation = fn.childForFieldName("return_type");
  if (!annotation) return null;
  return annotation.text.replace(/^:/, "").trim();
}

function scriptCallee(call: SyntaxNode): string | null {
  const fn = call.childForFieldName("function");
  if (fn?.type === "identifier") return fn.text;
  if (fn?.type === "member_expression") return fn.childForFieldName("property")?.text ?? null;
  return null;
}

/**
 * The function a declaration-like node introduces, if any: the node holding
 * the parameters and body, and the name it is declared under.
 */
function scriptDeclaration(node: SyntaxNode): { name: string; fn: SyntaxNode } | null {
  switch (node.type) {
    case "function_declaration":
    case "generator_function_declaration":
    case "method_definition": {
      const name = node.childForFieldName("name");
      return name ? { name: name.text, fn: node } : null;
    }

    case "variable_declarator":
    case "public_field_definition":
    case "field_definition": {
      const value = node.childForFieldName("value");
      const name = node.childForFieldName("name") ?? node.childForFieldName("property");
      if (!value || !FUNCTION_VALUES.has(value.type)) return null;
      if (!name || (name.type !== "identifier" && name.type !== "property_identifier" && name.type !== "private_property_identifier")) {
        return null;
      }
      return { name: name.text, fn: value };
    }

    default:
      return null;
  }
}

function visitScript(node: SyntaxNode, current: FunctionDeclaration | null, state: WalkState): void {
  const declaration = scriptDeclaration(node);
  if (declaration) {
    const decorators = node.namedChildren.filter((c) => c.type === "decorator");
    const fn = declare(
      state,
      node,
      declaration.name,
      scriptParams(declaration.fn),
      scriptReturnType(declaration.fn),
      decorators.map(decoratorText)
    );
    walkChildren(node, fn, state, visitScript);
    return;
  }

  if (node.type === "call_expression") {
    const callee = scriptCallee(node);
    if (current && callee) current.calls.push(callee);
  }

  walkChildren(node, current, state, visitScript);
}

function walkChildren(
  node: SyntaxNode,
  current: FunctionDeclaration | null,
  state: WalkState,
  visit: (node: SyntaxNode, current: FunctionDeclaration | null, state: WalkState) => void
): void {
  for (const child of node.children) {
    visit(child, current, state);
  }
}
