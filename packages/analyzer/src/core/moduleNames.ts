/**
 * Path and import-specifier to dotted-name conversions.
 */

import path from "node:path";

import { LANGUAGES, type Language, type SymbolName } from "./model.js";

const SOURCE_EXTENSIONS = new Set(Object.values(LANGUAGES).flatMap((lang) => lang.extensions));

export function toPosixPath(filePath: string): string {
  return filePath.split(path.sep).join("/");
}

export function stripSourceExtension(filePath: string): string {
  const ext = path.posix.extname(filePath).toLowerCase();
  return SOURCE_EXTENSIONS.has(ext) ? filePath.slice(0, -ext.length) : filePath;
}

/**
 * Split a root-relative path into module segments, dropping the
 * extension and a trailing package entry ("pkg/__init__.py" -> ["pkg"]).
 */
export function modulePathSegments(relativePath: string, language: Language): string[] {
  const segments = stripSourceExtension(toPosixPath(relativePath))
    .split("/")
    .filter((s) => s.length > 0 && s !== ".");
  if (segments.length > 1 && segments[segments.length - 1] === language.packageEntry) {
    segments.pop();
  }
  return segments;
}

export function moduleNameFromPath(relativePath: string, language: Language): SymbolName {
  return modulePathSegments(relativePath, language).join(".");
}

/**
 * First dotted segment: the namespace a module or import belongs to.
 */
export function topLevelName(name: SymbolName): string {
  const dot = name.indexOf(".");
  return dot < 0 ? name : name.slice(0, dot);
}

/**
 * Directory segments of a root-relative path: the package a file lives in.
 */
export function packageSegments(relativePath: string): string[] {
  const dir = path.posix.dirname(toPosixPath(relativePath));
  return dir === "." ? [] : dir.split("/").filter((s) => s.length > 0);
}

/**
 * Resolve a Python `from` module (".x", "..", "a.b") against the importing file.
 * Returns null when the relative prefix climbs above the analysis root.
 */
export function resolvePythonModule(moduleText: string, importingFile: string): string[] | null {
  const match = /^(\.*)(.*)$/.exec(moduleText.replace(/\s+/g, ""));
  const dots = match?.[1].length ?? 0;
  const rest = (match?.[2] ?? "").split(".").filter((s) => s.length > 0);

  if (dots === 0) return rest;

  const base = packageSegments(importingFile);
  const climb = dots - 1;
  if (climb > base.length) return null;

  const segments = [...base.slice(0, base.length - climb), ...rest];
  return segments.length > 0 ? segments : null;
}

/**
 * Resolve a JS/TS module specifier.
 * Relative specifiers become root-relative module segments, or null when they climb
 * above the root; bare specifiers keep the package name (with its @scope) as the
 * first segment.
 */
export function resolveScriptSpecifier(specifier: string, importingFile: string): string[] | null {
  if (specifier.length === 0) return null;

  if (specifier.startsWith(".") || specifier.startsWith("/")) {
    const from = path.posix.dirname(toPosixPath(importingFile));
    const joined = specifier.startsWith("/") ? specifier : path.posix.join(from, specifier);
    const resolved = stripSourceExtension(path.posix.normalize(joined))
      .split("/")
      .filter((s) => s.length > 0 && s !== ".");
    if (resolved[0] === "..") return null;
    if (resolved.length > 1 && resolved[resolved.length - 1] === "index") {
      resolved.pop();
    }
    return resolved.length > 0 ? resolved : null;
  }

  const parts = specifier.split("/").filter((s) => s.length > 0);
  if (parts.length === 0) return null;
  if (parts[0].startsWith("@") && parts.length > 1) {
    return [`${parts[0]}/${parts[1]}`, ...parts.slice(2)];
  }
  return parts;
}
