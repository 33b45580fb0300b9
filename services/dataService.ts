import Papa from 'papaparse';
import { CellValue, DataTable, LoadedResult, LoadResult, TableRow, TextReader } from '../types';
import { SECONDS_PER_HOUR } from '../config';

// Simulation export aliases -> canonical column names
// Raw export header: time, Pl/t, Ppv/t, Pload, Ppv, Vload:1, Vpv, Iload, Ipv
export const COLUMN_ALIASES: ReadonlyMap<string, string> = new Map([
  ['time', 'Time'],
  ['Time_Seconds', 'Time'], // weather input format
  ['Pl/t', 'Energy_Load'],
  ['Ppv/t', 'Energy_PV'],
  ['Vload:1', 'Vload'],
]);

export const TIME_COLUMN = 'Time';

export class CsvParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CsvParseError';
  }
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INFINITY = /^([+-]?)inf(inity)?$/i;

// Decimal numbers as numbers, blanks and NaN as null, everything else kept as text
export const toCell = (raw: string): CellValue => {
  const value = raw.trim();
  if (value === '' || value.toLowerCase() === 'nan') return null;
  if (DECIMAL.test(value)) return Number(value);
  const inf = INFINITY.exec(value);
  if (inf) return inf[1] === '-' ? -Infinity : Infinity;
  return value;
};

// Repeated header names get a numeric suffix: a, a -> a, a.1
export const dedupeHeader = (header: string[]): string[] => {
  const used = new Set<string>();
  return header.map(name => {
    let candidate = name;
    for (let n = 1; used.has(candidate); n++) candidate = `${name}.${n}`;
    used.add(candidate);
    return candidate;
  });
};

export const parseCsv = (text: string): DataTable => {
  const result = Papa.parse<string[]>(text.replace(/^\uFEFF/, ''), {
    delimiter: ',',
    skipEmptyLines: 'greedy',
  });

  const quoteError = result.errors.find(e => e.type === 'Quotes');
  if (quoteError) {
    throw new CsvParseError(`${quoteError.message} (row ${quoteError.row ?? '?'})`);
  }

  const [rawHeader, ...body] = result.data;
  if (!rawHeader || rawHeader.length === 0) {
    throw new CsvParseError('No columns to parse from file');
  }
  const header = dedupeHeader(rawHeader);

  const rows = body.map((fields, i) => {
    if (fields.length > header.length) {
      // Line numbers are 1-based and count the header
      throw new CsvParseError(`Expected ${header.length} fields in line ${i + 2}, saw ${fields.length}`);
    }
    const row: TableRow = {};
    header.forEach((name, col) => {
      row[name] = col < fields.length ? toCell(fields[col]) : null;
    });
    return row;
  });

  return { columns: header, rows };
};

export const renameColumn = (name: string): string => COLUMN_ALIASES.get(name) ?? name;

export const renameColumns = (columns: string[]): string[] =>
  Array.from(new Set(columns.map(renameColumn)));

// Renames aliases and converts Time from seconds to hours.
// When two source columns map to the same name the first one wins.
// A Time cell that is neither blank nor numeric fails the whole table.
export const normalizeTable = (table: DataTable): DataTable => {
  const columns = renameColumns(table.columns);
  const hasTime = columns.includes(TIME_COLUMN);

  const rows = table.rows.map(source => {
    const row: TableRow = {};
    const seen = new Set<string>();
    for (const name of table.columns) {
      const target = renameColumn(name);
      if (seen.has(target)) continue;
      seen.add(target);
      row[target] = source[name] ?? null;
    }
    if (hasTime) {
      const t = row[TIME_COLUMN];
      if (typeof t === 'string') {
        throw new CsvParseError(`Non-numeric value "${t}" in column ${TIME_COLUMN}`);
      }
      if (t !== null) row[TIME_COLUMN] = t / SECONDS_PER_HOUR;
    }
    return row;
  });

  return { columns, rows };
};

const describeError = (err: unknown): string => (err instanceof Error ? err.message : String(err));

export const loadTable = async (path: string, readText: TextReader): Promise<LoadResult> => {
  try {
    const text = await readText(path);
    if (text === null) return { status: 'absent', path };
    return { status: 'loaded', path, table: normalizeTable(parseCsv(text)) };
  } catch (err) {
    console.error(`Error loading ${path}:`, err);
    return { status: 'error', path, message: `Error loading ${path}: ${describeError(err)}` };
  }
};

export interface TableLoader {
  load: (path: string) => Promise<LoadResult>;
}

// Source files are static for the session, so results are kept per path
export const createTableLoader = (readText: TextReader): TableLoader => {
  const cache = new Map<string, Promise<LoadResult>>();
  return {
    load: (path) => {
      const cached = cache.get(path);
      if (cached) return cached;
      const pending = loadTable(path, readText);
      cache.set(path, pending);
      return pending;
    },
  };
};

// The subset of a fetch Response the reader relies on
export interface HttpResponse {
  status: number;
  ok: boolean;
  statusText: string;
  headers: { get: (name: string) => string | null };
  text: () => Promise<string>;
}

export type Fetcher = (url: string) => Promise<HttpResponse>;

export const createFetchReader = (fetcher: Fetcher = (url) => fetch(url)): TextReader => async (path) => {
  const response = await fetcher(path);
  if (response.status === 404) return null;
  // Vite and most static hosts answer unknown paths with index.html
  const contentType = response.headers.get('content-type') ?? '';
  if (contentType.includes('text/html')) return null;
  if (!response.ok) throw new Error(`HTTP ${response.status} ${response.statusText}`);
  return response.text();
};

export const isUsable = (result: LoadResult): result is LoadedResult =>
  result.status === 'loaded' && result.table.rows.length > 0;

export const hasColumns = (table: DataTable, names: string[]): boolean =>
  names.every(name => table.columns.includes(name));

export const missingColumns = (table: DataTable, names: string[]): string[] =>
  names.filter(name => !table.columns.includes(name));

export const numericColumn = (table: DataTable, name: string): number[] =>
  table.rows.flatMap(row => {
    const v = row[name];
    return typeof v === 'number' ? [v] : [];
  });
