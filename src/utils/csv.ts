import fs from 'fs/promises';
import Papa from 'papaparse';

/**
 * CSV helpers for the feature input and analysis output files
 *
 * Records are carried positionally so the header is written back exactly as
 * read, duplicate column names included.
 */

export interface CsvTable {
  /** Header names in file order, as written */
  fields: string[];
  /** Data records, each padded or cut to `fields.length` cells */
  records: string[][];
}

/**
 * Parse CSV text without treating the first line as a header
 */
export function parseCsvRecords(content: string): string[][] {
  const parsed = Papa.parse<string[]>(content, {
    header: false,
    skipEmptyLines: true,
  });
  return parsed.data;
}

/**
 * Parse CSV text whose first record is the header. Cells missing from short
 * records read as "".
 */
export function parseCsvTable(content: string): CsvTable {
  const [fields = [], ...data] = parseCsvRecords(content);
  const records = data.map((record) => fields.map((_field, index) => record[index] ?? ''));
  return { fields, records };
}

/**
 * Cell of the first column named `field`; "" when there is no such column
 */
export function getCell(table: CsvTable, record: string[], field: string): string {
  const index = table.fields.indexOf(field);
  return index === -1 ? '' : record[index] ?? '';
}

/**
 * Serialize records under the given header
 */
export function formatCsvTable(fields: string[], records: string[][]): string {
  return Papa.unparse(
    {
      fields,
      data: records.map((record) => fields.map((_field, index) => record[index] ?? '')),
    },
    { newline: '\n' }
  );
}

/**
 * Drop a leading UTF-8 byte order mark so the first header name matches
 */
export function stripBom(content: string): string {
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}

export async function readCsvTable(filePath: string): Promise<CsvTable> {
  const content = await fs.readFile(filePath, 'utf-8');
  return parseCsvTable(stripBom(content));
}

export async function writeCsvTable(filePath: string, fields: string[], records: string[][]): Promise<void> {
  await fs.writeFile(filePath, formatCsvTable(fields, records) + '\n', 'utf-8');
}
