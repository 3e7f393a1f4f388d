export function quoteIdentifier(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

export function qualifiedName(...parts: string[]): string {
  return parts.join('.');
}
