import type { Type } from "@nimbus-fn/types";

const OPENERS: Record<string, string> = { "(": ")", "[": "]", "{": "}" };

/** Index of the bracket closing the one at `open`, skipping string literals. */
function findClosing(source: string, open: number): number {
  const stack: string[] = [];
  let quote: string | null = null;

  for (let i = open; i < source.length; i++) {
    const char = source.charAt(i);
    if (quote) {
      if (char === "\\") i++;
      else if (char === quote) quote = null;
      continue;
    }
    if (char === '"' || char === "'" || char === "`") {
      quote = char;
    } else if (char in OPENERS) {
      stack.push(OPENERS[char] ?? "");
    } else if (char === stack[stack.length - 1]) {
      stack.pop();
      if (stack.length === 0) return i;
    }
  }
  return -1;
}

function splitTopLevel(list: string): string[] {
  const parts: string[] = [];
  let start = 0;
  for (let i = 0; i < list.length; i++) {
    const char = list.charAt(i);
    if (char in OPENERS || char === '"' || char === "'" || char === "`") {
      const end = char in OPENERS ? findClosing(list, i) : list.indexOf(char, i + 1);
      if (end === -1) break;
      i = end;
    } else if (char === ",") {
      parts.push(list.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(list.slice(start));
  return parts.map((part) => part.trim()).filter(Boolean);
}

function ownConstructorParameters(source: string): string[] | null {
  const match = /\bconstructor\s*\(/.exec(source);
  if (!match) return null;
  const open = match.index + match[0].length - 1;
  const close = findClosing(source, open);
  if (close === -1) return null;
  return splitTopLevel(source.slice(open + 1, close));
}

/**
 * Constructor parameter names read from the class source. Destructured
 * parameters are named `arg<index>`. Classes without their own constructor
 * report their nearest ancestor's parameters.
 */
export function getConstructorParameterNames(target: Type): string[] {
  let current: unknown = target;
  while (typeof current === "function" && current !== Function.prototype) {
    const params = ownConstructorParameters(Function.prototype.toString.call(current));
    if (params) {
      return params.map((param, index) => {
        const name = param.replace(/^\.\.\./, "").split("=")[0]?.trim() ?? "";
        return /^[A-Za-z_$][\w$]*$/.test(name) ? name : `arg${index}`;
      });
    }
    current = Object.getPrototypeOf(current);
  }
  return [];
}
