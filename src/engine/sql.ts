/**
 * SQL text helpers shared by the engine adapters
 */

/**
 * Quote an identifier (table or column name) for use in generated SQL
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Quote a string literal (file paths, mostly)
 */
export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Render a list literal of quoted strings: ['a', 'b']
 */
export function quoteLiteralList(values: readonly string[]): string {
  return `[${values.map(quoteLiteral).join(', ')}]`;
}

/**
 * Trim whitespace and any trailing statement terminators
 */
export function stripTrailingSemicolons(sql: string): string {
  return sql.trim().replace(/(\s*;)+$/, '').trim();
}
