/**
 * Small helpers for assembling generated source text
 */

export type Line = string | false | null | undefined | readonly Line[];

/**
 * Join lines into file content with a single trailing newline. Falsy entries are dropped,
 * nested arrays are flattened.
 */
export function lines(...parts: Line[]): string {
  const out: string[] = [];
  const visit = (part: Line): void => {
    if (part === false || part === null || part === undefined) {
      return;
    }
    if (typeof part === "string") {
      out.push(part);
      return;
    }
    for (const child of part) {
      visit(child);
    }
  };
  parts.forEach(visit);
  return `${out.join("\n")}\n`;
}

export function indent(text: string, depth = 1): string {
  const pad = "  ".repeat(depth);
  return text.length === 0 ? text : `${pad}${text}`;
}

/**
 * Render a single-quoted string literal
 */
export function quote(value: string): string {
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/'/g, "\\'")
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r");
  return `'${escaped}'`;
}

export function quoteList(values: readonly string[]): string {
  return `[${values.map(quote).join(", ")}]`;
}
