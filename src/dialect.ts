/**
 * Dialect identity — which driver labels name SQL Server.
 */

export const MSSQL_DIALECTS: readonly string[] = ['mssql', 'sqlserver'];

export function normalizeDialect(label: string): string {
  return label.trim().toLowerCase();
}

export function isMssqlDialect(label: string): boolean {
  return MSSQL_DIALECTS.includes(normalizeDialect(label));
}
