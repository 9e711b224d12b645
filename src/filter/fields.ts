/**
 * Column name suggestions for error messages
 */

/**
 * Suggest columns sharing a prefix with the given name
 * @param name - The mistyped name (case-insensitive)
 * @param columns - Columns that exist
 */
export function suggestColumns(name: string, columns: readonly string[]): string[] {
  const lower = name.toLowerCase();
  if (!lower) return [];
  const prefix = lower.slice(0, Math.max(1, Math.ceil(lower.length / 2)));
  return columns.filter((c) => c.toLowerCase().startsWith(prefix));
}
