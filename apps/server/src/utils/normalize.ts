export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function trimParens(value: string): string {
  return value.replace(/^[()]+|[()]+$/g, "");
}

export function telNumber(href: string): string | null {
  return href.startsWith("tel:") ? href.slice("tel:".length) : null;
}
