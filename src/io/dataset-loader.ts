// src/io/dataset-loader.ts

import * as fs from 'fs/promises';
import * as path from 'path';
import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { createDataset, Dataset, FieldValue } from '../core/dataset.js';
import { LoadError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

export interface LoadOptions {
  /** Dataset name; defaults to the file name without extension */
  name?: string;
  /** Worksheet for .xlsx/.xls files; defaults to the first sheet */
  sheet?: string;
}

type RawRows = Array<Record<string, FieldValue>>;

interface ParsedTable {
  rows: RawRows;
  firstDataLine: number | null;
}

const SUPPORTED_EXTENSIONS = ['.csv', '.xlsx', '.xls', '.json'];

/**
 * Reads a dataset file into memory. Every failure surfaces as a LoadError
 * before any pipeline stage runs.
 */
export class DatasetLoader {
  constructor(private basePath: string) {}

  async load(filePath: string, options: LoadOptions = {}): Promise<Dataset> {
    const sourcePath = path.resolve(this.basePath, filePath);
    const table = await this.parseFile(sourcePath, options.sheet);

    if (table.rows.length === 0) {
      Logger.warn(`${sourcePath} contains no data rows`);
    }

    return createDataset(options.name ?? path.parse(sourcePath).name, table.rows, {
      firstDataLine: table.firstDataLine,
    });
  }

  /**
   * Loads the dataset plus the named reference tables its relational rules use.
   */
  async loadWithLookups(
    filePath: string,
    lookups: Readonly<Record<string, string>>,
    options: LoadOptions = {}
  ): Promise<Dataset> {
    const dataset = await this.load(filePath, options);

    const loaded: Record<string, Dataset> = {};
    for (const [name, lookupPath] of Object.entries(lookups)) {
      loaded[name] = await this.load(lookupPath, { name });
    }

    return createDataset(
      dataset.name,
      dataset.records.map((record) => record.fields),
      { firstDataLine: dataset.firstDataLine, lookups: loaded }
    );
  }

  private async parseFile(sourcePath: string, sheet?: string): Promise<ParsedTable> {
    const extension = path.extname(sourcePath).toLowerCase();
    if (!SUPPORTED_EXTENSIONS.includes(extension)) {
      throw new LoadError(
        sourcePath,
        `Unsupported format "${extension || '(none)'}". Supported: ${SUPPORTED_EXTENSIONS.join(', ')}`
      );
    }

    let buffer: Buffer;
    try {
      buffer = await fs.readFile(sourcePath);
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code === 'ENOENT') {
        throw new LoadError(sourcePath, 'File not found');
      }
      throw new LoadError(sourcePath, `Cannot read file: ${(error as Error).message}`);
    }

    switch (extension) {
      case '.csv':
        return parseCsv(sourcePath, buffer.toString('utf-8'));
      case '.json':
        return parseJson(sourcePath, buffer.toString('utf-8'));
      default:
        return parseWorkbook(sourcePath, buffer, sheet);
    }
  }
}

export function parseCsv(sourcePath: string, text: string): ParsedTable {
  const content = text.replace(/^\uFEFF/, '');
  if (content.trim() === '') {
    throw new LoadError(sourcePath, 'File is empty');
  }

  const parsed = Papa.parse<Record<string, string | undefined>>(content, {
    header: true,
    skipEmptyLines: true,
  });

  // Ragged rows are data problems for the validators, not load failures
  const fatal = parsed.errors.find((error) => error.type !== 'FieldMismatch');
  if (fatal) {
    const where = fatal.row !== undefined ? ` (row ${fatal.row + 1})` : '';
    throw new LoadError(sourcePath, `CSV parse error${where}: ${fatal.message}`);
  }

  const columns = parsed.meta.fields ?? [];
  if (columns.length === 0) {
    throw new LoadError(sourcePath, 'Missing header row');
  }

  const rows = parsed.data.map((row) => {
    const fields: Record<string, FieldValue> = {};
    for (const column of columns) {
      fields[column] = row[column] ?? null;
    }
    return fields;
  });

  return { rows, firstDataLine: 2 };
}

export function parseJson(sourcePath: string, text: string): ParsedTable {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new LoadError(sourcePath, `Invalid JSON: ${(error as Error).message}`);
  }

  if (!Array.isArray(data)) {
    throw new LoadError(sourcePath, 'JSON datasets must be an array of objects');
  }

  const rows = data.map((item: unknown, index) => {
    if (item === null || typeof item !== 'object' || Array.isArray(item)) {
      throw new LoadError(sourcePath, `Item ${index} is not an object`);
    }
    const fields: Record<string, FieldValue> = {};
    for (const [key, value] of Object.entries(item)) {
      fields[key] = toFieldValue(sourcePath, value, `item ${index}, "${key}"`);
    }
    return fields;
  });

  return { rows, firstDataLine: null };
}

export function parseWorkbook(sourcePath: string, buffer: Buffer, sheet?: string): ParsedTable {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });
  } catch (error) {
    throw new LoadError(sourcePath, `Invalid workbook: ${(error as Error).message}`);
  }

  const sheetName = sheet ?? workbook.SheetNames[0];
  const worksheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!worksheet) {
    throw new LoadError(
      sourcePath,
      sheet ? `Sheet "${sheet}" not found. Available: [${workbook.SheetNames.join(', ')}]` : 'Workbook has no sheets'
    );
  }

  const raw = XLSX.utils.sheet_to_json<Record<string, unknown>>(worksheet, { defval: null, raw: true });
  const rows = raw.map((row, index) => {
    const fields: Record<string, FieldValue> = {};
    for (const [key, value] of Object.entries(row)) {
      fields[key] = toFieldValue(sourcePath, value, `row ${index + 2}, "${key}"`);
    }
    return fields;
  });

  return { rows, firstDataLine: 2 };
}

function toFieldValue(sourcePath: string, value: unknown, at: string): FieldValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (typeof value === 'boolean') return String(value);
  if (value instanceof Date) return value;
  throw new LoadError(sourcePath, `Unsupported cell value at ${at}: nested values are not tabular`);
}
