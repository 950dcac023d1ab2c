/**
 * Convert column index (0-based) to Excel letter(s): 0→A, 25→Z, 26→AA
 */
export function colIndexToLetter(index: number): string {
  let result = '';
  let n = index;
  while (n >= 0) {
    result = String.fromCharCode((n % 26) + 65) + result;
    n = Math.floor(n / 26) - 1;
  }
  return result;
}

/**
 * Build an A1 reference from a 0-based column and a 1-based sheet row: (3, 2) → "D2"
 */
export function buildCellAddress(col: number, sheetRow: number): string {
  if (!Number.isInteger(col) || col < 0) throw new Error(`Invalid column index: ${col}`);
  if (!Number.isInteger(sheetRow) || sheetRow < 1) throw new Error(`Invalid sheet row: ${sheetRow}`);
  return `${colIndexToLetter(col)}${sheetRow}`;
}

/**
 * Format a date as dd/MM/yyyy using its UTC fields (Excel dates carry no zone)
 */
export function formatDate(date: Date): string {
  const day = String(date.getUTCDate()).padStart(2, '0');
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  return `${day}/${month}/${date.getUTCFullYear()}`;
}
