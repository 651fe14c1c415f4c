/** Character data: only `&` and `<` (and `>` for `]]>`) need escaping. */
export function escapeText(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/** Double-quoted attribute values additionally escape the quote. */
export function escapeAttr(value: string): string {
  return escapeText(value).replace(/"/g, "&quot;");
}

/** ` k="v"` pairs in insertion order; empty for no attributes. */
export function attrList(attrs: Record<string, string>): string {
  return Object.entries(attrs)
    .map(([name, value]) => ` ${name}="${escapeAttr(value)}"`)
    .join("");
}
