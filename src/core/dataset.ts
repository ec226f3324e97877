// src/core/dataset.ts

/**
 * A single cell value after loading. Spreadsheet loaders may hand over Date
 * cells directly; CSV and JSON loaders produce strings and numbers.
 */
export type FieldValue = string | number | Date | null;

export interface DataRecord {
  /** 0-based position in the source, stable across every stage */
  readonly rowIndex: number;
  readonly fields: Readonly<Record<string, FieldValue>>;
}

export interface Dataset {
  readonly name: string;
  readonly records: readonly DataRecord[];
  /** 1-based source line of row 0 (2 when the file has a header row), null when unknown */
  readonly firstDataLine: number | null;
  /** Reference tables used by relational rules, keyed by lookup name */
  readonly lookups: Readonly<Record<string, Dataset>>;
}

export interface DatasetOptions {
  firstDataLine?: number | null;
  lookups?: Record<string, Dataset>;
}

/**
 * Builds a Dataset from plain rows, assigning row indices in input order.
 */
export function createDataset(
  name: string,
  rows: ReadonlyArray<Record<string, FieldValue>>,
  options: DatasetOptions = {}
): Dataset {
  return {
    name,
    records: rows.map((fields, rowIndex) => ({ rowIndex, fields: { ...fields } })),
    firstDataLine: options.firstDataLine ?? null,
    lookups: { ...(options.lookups ?? {}) },
  };
}

/**
 * Deep-freezes a dataset so concurrent validators can share it read-only.
 * Date cells are left as they are: freezing does not stop Date setters.
 */
export function freezeDataset(dataset: Dataset): Dataset {
  for (const record of dataset.records) {
    Object.freeze(record.fields);
    Object.freeze(record);
  }
  Object.freeze(dataset.records);
  for (const lookup of Object.values(dataset.lookups)) {
    freezeDataset(lookup);
  }
  Object.freeze(dataset.lookups);
  return Object.freeze(dataset);
}

/**
 * Converts a row index into the line a user sees in the source file.
 */
export function sourceLine(dataset: Pick<Dataset, 'firstDataLine'>, rowIndex: number): number | null {
  return dataset.firstDataLine === null ? null : dataset.firstDataLine + rowIndex;
}

export function isDateValue(value: FieldValue): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

export function isNumberValue(value: FieldValue): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Normalizes a key cell for index lookups so 12 and "12" match.
 */
export function keyOf(value: FieldValue): string | null {
  if (value === null) return null;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}
