/**
 * CSV Serialization
 *
 * RFC 4180 style: fields containing a comma, quote or line break are quoted
 * and inner quotes doubled. Cell conversion:
 * - null / undefined → empty cell
 * - Date → ISO 8601 (UTC)
 * - objects and arrays → compact JSON
 * - everything else → String(value)
 */

export const CSV_LINE_END = "\n";

export function escapeCsv(field: string): string {
  if (/[",\r\n]/.test(field)) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}

export function toCsvCell(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/** One CSV record, terminated by `CSV_LINE_END` */
export function toCsvLine(values: readonly unknown[]): string {
  return values.map((value) => escapeCsv(toCsvCell(value))).join(",") + CSV_LINE_END;
}

/**
 * JSON cell: compact JSON of the value, or an empty cell for null.
 * Strings are JSON-quoted so every non-empty cell parses back.
 */
export function toJsonCell(value: unknown): string {
  return value === null || value === undefined ? "" : JSON.stringify(value);
}
