import { MISSING, type Cell } from './types.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.\d*|\.\d+|\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_FLOATS: Record<string, number> = {
  inf: Number.POSITIVE_INFINITY,
  '+inf': Number.POSITIVE_INFINITY,
  '-inf': Number.NEGATIVE_INFINITY
};

// Tokens read as missing values rather than text.
const MISSING_VALUE_TOKENS: ReadonlySet<string> = new Set([
  '',
  'NA',
  'N/A',
  'n/a',
  'NaN',
  'nan',
  '-NaN',
  '-nan',
  '#N/A',
  '<NA>',
  'null',
  'NULL',
  'None'
]);

export function inferCell(raw: string): Cell {
  const trimmed = raw.trim();
  if (MISSING_VALUE_TOKENS.has(trimmed)) {
    return MISSING;
  }

  const lowered = trimmed.toLowerCase();
  if (lowered === 'true' || lowered === 'false') {
    return { kind: 'boolean', value: lowered === 'true' };
  }

  if (INTEGER_PATTERN.test(trimmed)) {
    const value = Number(trimmed);
    return Number.isSafeInteger(value) ? { kind: 'integer', value } : { kind: 'float', value };
  }

  if (FLOAT_PATTERN.test(trimmed)) {
    return { kind: 'float', value: Number(trimmed) };
  }

  const special = SPECIAL_FLOATS[lowered];
  if (special !== undefined) {
    return { kind: 'float', value: special };
  }

  return { kind: 'string', value: trimmed };
}

export function numberCell(value: number): Cell {
  if (Number.isNaN(value)) {
    return MISSING;
  }
  return Number.isInteger(value) ? { kind: 'integer', value } : { kind: 'float', value };
}

export function textCell(value: string): Cell {
  const trimmed = value.trim();
  return trimmed.length === 0 ? MISSING : { kind: 'string', value: trimmed };
}

/** Plain-text form of a cell for writers; missing cells render as `null`. */
export function cellText(cell: Cell): string | null {
  switch (cell.kind) {
    case 'missing':
      return null;
    case 'boolean':
      return cell.value ? 'True' : 'False';
    case 'string':
      return cell.value;
    case 'integer':
      return formatNumber(cell.value);
    case 'float':
      return formatFloat(cell.value);
  }
}

// Whole-number floats keep a decimal point so they read back as floats.
function formatFloat(value: number): string {
  const text = formatNumber(value);
  return Number.isInteger(value) && /^-?\d+$/.test(text) ? `${text}.0` : text;
}

function formatNumber(value: number): string {
  if (value === Number.POSITIVE_INFINITY) {
    return 'inf';
  }
  if (value === Number.NEGATIVE_INFINITY) {
    return '-inf';
  }
  return String(value);
}
