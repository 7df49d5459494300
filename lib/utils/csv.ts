/**
 * Delimited text output for report commands
 */

export type CsvValue = string | number | boolean | null | undefined;

/**
 * Quote a field only when it contains the delimiter, a quote or a line break
 */
export function formatCsvField(value: CsvValue, delimiter = ","): string {
  if (value === null || value === undefined) return "";

  const stringValue = String(value);
  if (stringValue.includes(delimiter) || stringValue.includes('"') || /[\r\n]/.test(stringValue)) {
    return `"${stringValue.replace(/"/g, '""')}"`;
  }
  return stringValue;
}

export function formatCsvRow(values: CsvValue[], delimiter = ","): string {
  return values.map((value) => formatCsvField(value, delimiter)).join(delimiter);
}

/**
 * Header plus one line per row; the header is dropped when `includeHeader` is false
 */
export function formatCsv(
  header: string[],
  rows: CsvValue[][],
  options: { delimiter?: string; includeHeader?: boolean } = {},
): string[] {
  const delimiter = options.delimiter ?? ",";
  const lines = rows.map((row) => formatCsvRow(row, delimiter));
  return options.includeHeader === false ? lines : [header.join(delimiter), ...lines];
}

/**
 * "2021-03-04T12:34:56.789Z" -> "2021-03-04 12:34:56"
 */
export function formatApiTimestamp(value: string | undefined): string {
  if (!value) return "";
  return value.split(".")[0].replace("T", " ").replace("Z", "");
}
