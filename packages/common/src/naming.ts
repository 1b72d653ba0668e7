function isUpper(char: string | undefined): boolean {
  return char !== undefined && char !== char.toLowerCase() && char === char.toUpperCase();
}

/**
 * Camel-cases a property name the way JSON serialisers with a camel-case
 * policy do: the leading run of capitals is lowered, keeping the last one
 * when it starts the next word.
 *
 * @example
 * toCamelCase("CustomerName") => "customerName"
 * toCamelCase("ID") => "id"
 * toCamelCase("URLValue") => "urlValue"
 */
export function toCamelCase(name: string): string {
  if (!name || !isUpper(name[0])) return name;

  const chars = [...name];
  for (let i = 0; i < chars.length; i++) {
    if (i === 1 && !isUpper(chars[i])) break;

    const next = chars[i + 1];
    if (i > 0 && next !== undefined && !isUpper(next)) {
      if (next === " ") chars[i] = (chars[i] ?? "").toLowerCase();
      break;
    }

    chars[i] = (chars[i] ?? "").toLowerCase();
  }
  return chars.join("");
}

/**
 * Returns `name + "s"`, or `null` when a plain `s` suffix would not be the
 * English plural (names ending in s, x, z, ch, sh or consonant + y).
 *
 * @example
 * simplePlural("Order") => "Orders"
 * simplePlural("Address") => null
 */
export function simplePlural(name: string): string | null {
  if (/(s|x|z|ch|sh|[^aeiou]y)$/i.test(name)) return null;
  return `${name}s`;
}

/** Upper-cases a name for use inside an environment variable name. */
export function toEnvSegment(name: string): string {
  return name.replaceAll(/[^A-Za-z0-9]/g, "_").toUpperCase();
}
