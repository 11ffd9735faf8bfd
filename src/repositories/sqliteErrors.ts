/**
 * SQLite reports both UNIQUE and TEXT PRIMARY KEY violations as
 * "SQLITE_CONSTRAINT: UNIQUE constraint failed: <table>.<column>"
 */
export function isUniqueViolation(error: unknown, column?: string): boolean {
  if (!(error instanceof Error) || !error.message.includes('UNIQUE constraint failed')) {
    return false;
  }
  return column === undefined || error.message.includes(column);
}
