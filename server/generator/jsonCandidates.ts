import { MalformedJsonError, NoJsonFoundError } from "./errors.js";

const FENCED_JSON_PATTERN = /```json[^\S\n]*\n?([\s\S]*?)(?:```|$)/i;
const IDENTIFIER_START = /[A-Za-z_$]/;
const IDENTIFIER_PART = /[A-Za-z0-9_$-]/;
const PYTHON_LITERALS: Record<string, string> = {
  True: "true",
  False: "false",
  None: "null"
};

function sanitizeJsonCandidate(value: string): string {
  return value.replace(/^\uFEFF/, "").replace(/[\u200B-\u200D\u2060]/g, "");
}

function resolveSearchRegion(text: string): string {
  const fenced = FENCED_JSON_PATTERN.exec(text);
  if (fenced && fenced[1].includes("{")) {
    return fenced[1];
  }
  return text;
}

/**
 * Returns the first balanced `{...}` span of the search region, or everything
 * from the first `{` when the object never closes.
 */
export function extractJsonCandidate(completionText: string): string | null {
  const region = sanitizeJsonCandidate(resolveSearchRegion(completionText));
  const start = region.indexOf("{");
  if (start === -1) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let index = start; index < region.length; index += 1) {
    const char = region[index];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === "\"") {
        inString = false;
      }
      continue;
    }

    if (char === "\"") {
      inString = true;
      continue;
    }

    if (char === "{") {
      depth += 1;
      continue;
    }

    if (char === "}") {
      depth -= 1;
      if (depth === 0) {
        return region.slice(start, index + 1);
      }
    }
  }

  return region.slice(start).trimEnd();
}

/**
 * Copies a double-quoted string starting at `start` and returns the index just
 * past its closing quote (or the end of input when it never closes).
 */
function copyDoubleQuoted(value: string, start: number, sink: string[]): number {
  let index = start;
  sink.push(value[index]);
  index += 1;
  let escaped = false;

  while (index < value.length) {
    const char = value[index];
    sink.push(char);
    index += 1;
    if (escaped) {
      escaped = false;
    } else if (char === "\\") {
      escaped = true;
    } else if (char === "\"") {
      break;
    }
  }

  return index;
}

export function stripJsonComments(value: string): string {
  const output: string[] = [];
  let index = 0;

  while (index < value.length) {
    const char = value[index];
    const next = value[index + 1];

    if (char === "\"") {
      index = copyDoubleQuoted(value, index, output);
      continue;
    }

    if (char === "/" && next === "/") {
      while (index < value.length && value[index] !== "\n") {
        index += 1;
      }
      continue;
    }

    if (char === "/" && next === "*") {
      index += 2;
      while (index < value.length && !(value[index] === "*" && value[index + 1] === "/")) {
        index += 1;
      }
      index += 2;
      continue;
    }

    output.push(char);
    index += 1;
  }

  return output.join("");
}

export function convertSingleQuotedStrings(value: string): string {
  const output: string[] = [];
  let index = 0;

  while (index < value.length) {
    const char = value[index];

    if (char === "\"") {
      index = copyDoubleQuoted(value, index, output);
      continue;
    }

    if (char !== "'") {
      output.push(char);
      index += 1;
      continue;
    }

    output.push("\"");
    index += 1;
    while (index < value.length) {
      const inner = value[index];
      if (inner === "\\" && index + 1 < value.length) {
        const escapedChar = value[index + 1];
        output.push(escapedChar === "'" ? "'" : `\\${escapedChar}`);
        index += 2;
        continue;
      }
      if (inner === "'") {
        output.push("\"");
        index += 1;
        break;
      }
      output.push(inner === "\"" ? "\\\"" : inner);
      index += 1;
    }
  }

  return output.join("");
}

/**
 * Outside strings: maps Python literals to JSON ones and quotes bare object keys.
 */
export function normalizeBareTokens(value: string): string {
  const output: string[] = [];
  let index = 0;

  while (index < value.length) {
    const char = value[index];

    if (char === "\"") {
      index = copyDoubleQuoted(value, index, output);
      continue;
    }

    const previous = index > 0 ? value[index - 1] : "";
    if (!IDENTIFIER_START.test(char) || IDENTIFIER_PART.test(previous)) {
      output.push(char);
      index += 1;
      continue;
    }

    let end = index + 1;
    while (end < value.length && IDENTIFIER_PART.test(value[end])) {
      end += 1;
    }
    const token = value.slice(index, end);

    let lookAhead = end;
    while (lookAhead < value.length && /\s/.test(value[lookAhead])) {
      lookAhead += 1;
    }

    if (value[lookAhead] === ":") {
      output.push(`"${token}"`);
    } else {
      output.push(PYTHON_LITERALS[token] ?? token);
    }
    index = end;
  }

  return output.join("");
}

export function removeTrailingCommas(value: string): string {
  const output: string[] = [];
  let index = 0;

  while (index < value.length) {
    const char = value[index];

    if (char === "\"") {
      index = copyDoubleQuoted(value, index, output);
      continue;
    }

    if (char === ",") {
      let lookAhead = index + 1;
      while (lookAhead < value.length && /\s/.test(value[lookAhead])) {
        lookAhead += 1;
      }

      const nextChar = value[lookAhead];
      if (nextChar === "}" || nextChar === "]") {
        index += 1;
        continue;
      }
    }

    output.push(char);
    index += 1;
  }

  return output.join("");
}

interface OpenContainer {
  closer: "}" | "]";
  awaitingValue: boolean;
}

/**
 * Closes whatever a cut-off completion left open: a string, a dangling comma or
 * colon, a key without a value, then every container in stack order.
 */
export function completeTruncation(value: string): string {
  const stack: OpenContainer[] = [];
  let inString = false;
  let escaped = false;
  let lastToken: "string" | "other" | null = null;

  for (const char of value) {
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === "\"") {
        inString = false;
        lastToken = "string";
      }
      continue;
    }

    if (/\s/.test(char)) {
      continue;
    }

    const top = stack.at(-1);
    if (char === "\"") {
      inString = true;
      continue;
    }
    if (char === "{") {
      stack.push({ closer: "}", awaitingValue: false });
    } else if (char === "[") {
      stack.push({ closer: "]", awaitingValue: true });
    } else if ((char === "}" || char === "]") && top?.closer === char) {
      stack.pop();
    } else if (char === ":" && top?.closer === "}") {
      top.awaitingValue = true;
    } else if (char === "," && top?.closer === "}") {
      top.awaitingValue = false;
    }
    lastToken = "other";
  }

  if (!inString && stack.length === 0) {
    return value;
  }

  let output = value;
  if (inString) {
    if (escaped) {
      output = output.slice(0, -1);
    }
    output += "\"";
    lastToken = "string";
  }

  output = output.trimEnd();
  if (output.endsWith(",")) {
    output = output.slice(0, -1).trimEnd();
  }

  const top = stack.at(-1);
  if (output.endsWith(":")) {
    output += " null";
  } else if (top?.closer === "}" && !top.awaitingValue && lastToken === "string") {
    output += ": null";
  }

  for (let index = stack.length - 1; index >= 0; index -= 1) {
    output += stack[index].closer;
  }

  return output;
}

export function repairJsonCandidate(candidate: string): string {
  const withoutComments = stripJsonComments(candidate);
  const doubleQuoted = convertSingleQuotedStrings(withoutComments);
  const normalizedTokens = normalizeBareTokens(doubleQuoted);
  const withoutTrailingCommas = removeTrailingCommas(normalizedTokens);
  return completeTruncation(withoutTrailingCommas);
}

function describeParseError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Extracts and decodes the configuration object from a completion. Strict
 * decoding first; the repair sequence runs once, only when that fails.
 */
export function decodeCompletionJson(completionText: string): unknown {
  const candidate = extractJsonCandidate(completionText);
  if (candidate === null) {
    throw new NoJsonFoundError();
  }

  try {
    return JSON.parse(candidate);
  } catch {
    const repaired = repairJsonCandidate(candidate);
    try {
      return JSON.parse(repaired);
    } catch (error) {
      throw new MalformedJsonError({ detail: describeParseError(error), candidate: repaired });
    }
  }
}
