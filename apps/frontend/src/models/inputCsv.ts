import { CsvError } from 'csv-parse';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { InvalidInputError } from './errors';
import { DERIVED_INPUT_UNITS, FIELD_SPECS, isInputKey } from './fields';
import { buildInput } from './inputAggregator';
import type { DerivedInputKey, InputRecord } from './types';

export const INPUT_CSV_FILENAME = 'shaft_input_parameters.csv';
export const INPUT_CSV_MIME = 'text/csv;charset=utf-8';

const DERIVED_KEYS: readonly DerivedInputKey[] = ['Dd_ratio', 'rd_ratio', 'Kt'];

type CsvColumn = { key: keyof InputRecord; unit: string };

const COLUMNS: readonly CsvColumn[] = [
  ...FIELD_SPECS.map((spec) => ({ key: spec.key, unit: spec.unit })),
  ...DERIVED_KEYS.map((key) => ({ key, unit: DERIVED_INPUT_UNITS[key] })),
];

/** "Da (mm)" -> "Da" */
function headerKey(header: string): string {
  const paren = header.indexOf('(');
  return (paren === -1 ? header : header.slice(0, paren)).trim();
}

// Plain decimal or exponent notation; hex, binary and Infinity are not numbers here.
const DECIMAL_CELL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

function parseNumericCell(cell: string): number {
  return DECIMAL_CELL.test(cell) ? parseFloat(cell) : Number.NaN;
}

function readRows(text: string): unknown {
  try {
    return parse(text, { skip_empty_lines: true, trim: true, bom: true, relax_column_count: true });
  } catch (err) {
    if (err instanceof CsvError) {
      throw new InvalidInputError([{ field: 'csv', message: err.message }]);
    }
    throw err;
  }
}

function isStringRow(row: unknown): row is string[] {
  return Array.isArray(row) && row.every((cell) => typeof cell === 'string');
}

/**
 * Serialises one input snapshot: a header of field names with units and a
 * single data row. Numbers are written at full precision.
 */
export function exportInputCsv(input: InputRecord): string {
  const header = COLUMNS.map((c) => `${c.key} (${c.unit})`);
  const row = COLUMNS.map((c) => input[c.key]);
  return stringify([header, row]);
}

/**
 * Reads a file produced by {@link exportInputCsv}. Derived columns are
 * recomputed from the raw fields rather than read back.
 *
 * @throws InvalidInputError for malformed CSV as well as bad field values.
 */
export function parseInputCsv(text: string): InputRecord {
  const rows = readRows(text);
  if (!Array.isArray(rows) || rows.length < 2) {
    throw new InvalidInputError([{ field: 'csv', message: 'CSV must contain a header row and a data row' }]);
  }

  const [header, data] = rows;
  if (!isStringRow(header) || !isStringRow(data)) {
    throw new InvalidInputError([{ field: 'csv', message: 'CSV rows could not be read' }]);
  }

  const fields: Record<string, unknown> = {};
  header.forEach((column, index) => {
    const key = headerKey(column);
    const cell = data[index];
    if (!isInputKey(key) || cell === undefined || cell === '') return;
    fields[key] = parseNumericCell(cell);
  });

  return buildInput(fields);
}
