/**
 * Variable interpolation for configuration values.
 *
 * Supported forms:
 *   $NAME  ${NAME}  ${NAME:-fallback}  leading ~  \$ \` \\ \= escapes
 * One pair of surrounding quotes is removed; single quotes disable
 * interpolation. Unset names expand to "". Command substitution is refused.
 */

import { ValidationError } from "../../errors/index.js";

export type VariableLookup = (name: string) => string | undefined;

const NAME_START = /[A-Za-z_]/;
const NAME_CHAR = /[A-Za-z0-9_]/;
const NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const ESCAPABLE = new Set(["$", "`", "\\", "="]);

function refuse(key: string, what: string): ValidationError {
  return new ValidationError(`${key}: ${what} is not supported in config values`, [key]);
}

/**
 * Index of the brace closing the one opened just before `start`.
 */
function findClosingBrace(text: string, start: number): number {
  let depth = 1;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (ch === "\\") {
      i++;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

function expandBraced(body: string, lookup: VariableLookup, key: string): string {
  const separator = body.indexOf(":-");
  const name = separator === -1 ? body : body.slice(0, separator);
  if (!NAME.test(name)) {
    throw refuse(key, `\${${body}}`);
  }

  const value = lookup(name);
  if (separator === -1) {
    return value ?? "";
  }
  if (value !== undefined && value !== "") {
    return value;
  }
  return interpolate(body.slice(separator + 2), lookup, key);
}

function interpolate(text: string, lookup: VariableLookup, key: string): string {
  let out = "";
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);
    const next = text.charAt(i + 1);

    if (ch === "\\" && ESCAPABLE.has(next)) {
      out += next;
      i += 2;
      continue;
    }

    if (ch === "`") {
      throw refuse(key, "command substitution");
    }

    if (ch === "$" && next === "(") {
      throw refuse(key, "command substitution");
    }

    if (ch === "$" && next === "{") {
      const close = findClosingBrace(text, i + 2);
      if (close === -1) {
        throw new ValidationError(`${key}: unterminated \${ in value`, [key]);
      }
      out += expandBraced(text.slice(i + 2, close), lookup, key);
      i = close + 1;
      continue;
    }

    if (ch === "$" && NAME_START.test(next)) {
      let end = i + 1;
      while (end < text.length && NAME_CHAR.test(text.charAt(end))) {
        end++;
      }
      out += lookup(text.slice(i + 1, end)) ?? "";
      i = end;
      continue;
    }

    out += ch;
    i++;
  }

  return out;
}

/**
 * Expand the right-hand side of a `key=value` line.
 *
 * @param raw - Text after the first unescaped `=`
 * @param lookup - Resolves a variable name; undefined means unset
 * @param key - Option being assigned, used in error messages
 */
export function expandValue(raw: string, lookup: VariableLookup, key: string): string {
  const first = raw.charAt(0);
  if (raw.length >= 2 && (first === "'" || first === '"') && raw.endsWith(first)) {
    const inner = raw.slice(1, -1);
    return first === "'" ? inner : interpolate(inner, lookup, key);
  }

  if (raw === "~" || raw.startsWith("~/")) {
    return (lookup("HOME") ?? "") + interpolate(raw.slice(1), lookup, key);
  }

  return interpolate(raw, lookup, key);
}
