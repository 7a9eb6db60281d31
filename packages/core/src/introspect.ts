// Runtime introspection of JavaScript functions: name, parameters, source text,
// and the module that registered them.
//
// Types are erased at runtime, so the signature is whatever the source text
// says: parameter names, defaults, rest and destructuring patterns.

import { basename, dirname, extname } from "node:path";
import { fileURLToPath } from "node:url";
import { types } from "node:util";
import type { CallableInfo, CallableParameter } from "./types/tool";
import { InvalidInputError } from "./types/errors";

/** Source identifier used when a callable's origin cannot be resolved. */
export const UNKNOWN_SOURCE = "/";

const OPENERS = "([{";
const CLOSERS = ")]}";

/**
 * Walk `text` skipping strings and comments, reporting each code character
 * with its bracket depth. Closers are reported at the depth they return to.
 * Return true from `visit` to stop.
 */
function walk(text: string, visit: (ch: string, index: number, depth: number) => boolean | void): void {
  let depth = 0;
  let quote: string | null = null;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (quote) {
      if (ch === "\\") {
        i++;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }

    if (ch === "/" && text[i + 1] === "*") {
      const end = text.indexOf("*/", i + 2);
      i = end === -1 ? text.length : end + 1;
      continue;
    }
    if (ch === "/" && text[i + 1] === "/") {
      const end = text.indexOf("\n", i + 2);
      i = end === -1 ? text.length : end;
      continue;
    }
    if (ch === '"' || ch === "'" || ch === "`") {
      quote = ch;
      continue;
    }

    if (CLOSERS.includes(ch)) depth--;
    if (visit(ch, i, depth) === true) return;
    if (OPENERS.includes(ch)) depth++;
  }
}

function stripComments(text: string): string {
  return text.replace(/\/\*[\s\S]*?\*\//g, "").replace(/\/\/[^\n]*/g, "");
}

function collapse(text: string): string {
  return stripComments(text).replace(/\s+/g, " ").trim();
}

/** The raw text between the parentheses of a function's parameter list. */
export function extractParameterList(source: string): string {
  const bare = /^(?:async\s+)?([A-Za-z_$][\w$]*)\s*=>/.exec(source);
  if (bare) return bare[1];

  const open = source.indexOf("(");
  if (open === -1) return "";

  let close = -1;
  walk(source.slice(open), (ch, index, depth) => {
    if (ch === ")" && depth === 0) {
      close = open + index;
      return true;
    }
  });

  return close === -1 ? "" : source.slice(open + 1, close);
}

/** Split a parameter list on its top-level commas. */
export function splitParameters(list: string): string[] {
  const parts: string[] = [];
  let start = 0;

  walk(list, (ch, index, depth) => {
    if (ch === "," && depth === 0) {
      parts.push(list.slice(start, index));
      start = index + 1;
    }
  });
  parts.push(list.slice(start));

  return parts.map(collapse).filter((p) => p.length > 0);
}

function defaultIndex(param: string): number {
  let found = -1;
  walk(param, (ch, index, depth) => {
    if (ch !== "=" || depth !== 0) return;
    const next = param[index + 1];
    const prev = param[index - 1];
    if (next === ">" || next === "=" || (prev !== undefined && "=!<>".includes(prev))) return;
    found = index;
    return true;
  });
  return found;
}

export function parseParameter(text: string): CallableParameter {
  const rest = text.startsWith("...");
  const eq = defaultIndex(text);
  const head = eq === -1 ? text : text.slice(0, eq);
  const name = head.replace(/^\.\.\./, "").trim();
  return { name, required: !rest && eq === -1, rest };
}

/**
 * Describe a function from its runtime representation.
 * Throws InvalidInputError for non-functions and classes.
 */
export function describeCallable(fn: unknown, nameOverride?: string): CallableInfo {
  if (typeof fn !== "function") {
    throw new InvalidInputError("The provided value must be a callable");
  }

  const source = Function.prototype.toString.call(fn).trim();
  if (/^class\b/.test(source)) {
    throw new InvalidInputError("Classes cannot be registered as tools");
  }

  const isNative = /\{\s*\[native code\]\s*\}$/.test(source);
  const name = nameOverride ?? (fn.name || "anonymous");

  let texts: string[];
  if (isNative) {
    texts = Array.from({ length: fn.length }, (_, i) => `arg${i}`);
  } else {
    texts = splitParameters(extractParameterList(source));
  }

  return {
    name,
    parameters: texts.map(parseParameter),
    signature: `${name}(${texts.join(", ")})`,
    source,
    isAsync: types.isAsyncFunction(fn),
    isNative,
  };
}

function framePath(line: string): string | undefined {
  const match = /\(?((?:file:\/\/)?(?:\/|[A-Za-z]:\\)[^():]*?):\d+:\d+\)?\s*$/.exec(line.trim());
  if (!match) return undefined;
  const raw = match[1];
  return raw.startsWith("file://") ? fileURLToPath(raw) : raw;
}

/**
 * Given a stack captured inside this package, return the file of the first
 * frame outside the capturing module's directory: the caller.
 * Undefined when it cannot be resolved.
 */
export function resolveCallerFile(stack: string | undefined): string | undefined {
  if (!stack) return undefined;

  let ownDir: string | undefined;
  for (const line of stack.split("\n").slice(1)) {
    const path = framePath(line);
    if (!path) continue;
    if (ownDir === undefined) {
      ownDir = dirname(path);
      continue;
    }
    if (dirname(path) !== ownDir) return path;
  }
  return undefined;
}

/** File name without extension, the way it appears in entry points. */
export function moduleIdentifier(path: string): string {
  return basename(path, extname(path));
}
