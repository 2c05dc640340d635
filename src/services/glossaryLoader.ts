import { readFileSync, statSync } from 'fs';
import type { GlossaryEntry } from '../types/index.js';

export const GLOSSARY_COLUMNS = [
  'english_label',
  'english_pos',
  'setswana_preferred',
  'setswana_variants',
  'setswana_pos',
] as const;

export type GlossaryColumn = typeof GLOSSARY_COLUMNS[number];

export type GlossaryRecord = Partial<Record<GlossaryColumn, string>>;

// Alternate spellings are packed into one cell: "gabisa|gapa godimo"
const VARIANT_DELIMITER = '|';

/**
 * Split CSV content into rows of raw cell values.
 * Handles double-quoted cells with embedded commas, newlines and "" escapes,
 * and both LF and CRLF line endings.
 */
export function parseCsv(content: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let current = '';
  let inQuotes = false;

  // Strip UTF-8 BOM written by spreadsheet exports
  const text = content.replace(/^\uFEFF/, '');

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    const nextChar = text[i + 1];

    if (inQuotes) {
      if (char === '"' && nextChar === '"') {
        current += '"';
        i++; // Skip escaped quote
      } else if (char === '"') {
        inQuotes = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      row.push(current);
      current = '';
    } else if (char === '\n' || char === '\r') {
      row.push(current);
      rows.push(row);
      row = [];
      current = '';
      if (char === '\r' && nextChar === '\n') i++;
    } else {
      current += char;
    }
  }

  // Last row without trailing newline
  if (current !== '' || row.length > 0) {
    row.push(current);
    rows.push(row);
  }

  return rows;
}

/**
 * Map CSV rows to records keyed by the (lowercased) header names.
 * Blank lines are dropped; cells beyond the header are ignored.
 */
export function toRecords(rows: string[][]): GlossaryRecord[] {
  if (rows.length === 0) return [];

  const header = rows[0].map(name => name.trim().toLowerCase());
  const records: GlossaryRecord[] = [];

  for (const row of rows.slice(1)) {
    if (row.every(cell => cell.trim() === '')) continue;

    const record: GlossaryRecord = {};
    for (const column of GLOSSARY_COLUMNS) {
      const idx = header.indexOf(column);
      if (idx !== -1 && idx < row.length) {
        record[column] = row[idx];
      }
    }
    records.push(record);
  }

  return records;
}

function optionalField(value: string | undefined): string | null {
  const trimmed = (value ?? '').trim();
  return trimmed || null;
}

/**
 * Validate a single record into a frozen entry.
 * Returns null when the English label or the preferred Setswana form is blank.
 */
export function parseGlossaryRecord(record: GlossaryRecord): GlossaryEntry | null {
  const englishLabel = (record.english_label ?? '').trim();
  if (!englishLabel) return null;

  const setswanaPreferred = (record.setswana_preferred ?? '').trim();
  if (!setswanaPreferred) return null;

  const setswanaVariants = (record.setswana_variants ?? '')
    .split(VARIANT_DELIMITER)
    .map(v => v.trim())
    .filter(Boolean);

  return Object.freeze({
    englishLabel,
    englishPos: optionalField(record.english_pos),
    setswanaPreferred,
    setswanaVariants: Object.freeze(setswanaVariants),
    setswanaPos: optionalField(record.setswana_pos),
  });
}

/**
 * Parse glossary CSV content into entries, in row order.
 * Incomplete rows are skipped.
 */
export function parseGlossaryCsv(content: string): GlossaryEntry[] {
  const entries: GlossaryEntry[] = [];
  for (const record of toRecords(parseCsv(content))) {
    const entry = parseGlossaryRecord(record);
    if (entry) entries.push(entry);
  }
  return entries;
}

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/**
 * Load entries from the configured CSV file.
 * No path, a missing file or an unreadable file all yield an empty list.
 */
export function loadGlossaryEntries(csvPath: string | null | undefined): GlossaryEntry[] {
  if (!csvPath || !isFile(csvPath)) {
    return [];
  }

  let content: string;
  try {
    content = readFileSync(csvPath, 'utf-8');
  } catch (error) {
    console.warn(`[Glossary] Could not read ${csvPath}, continuing without glossary:`, error);
    return [];
  }

  return parseGlossaryCsv(content);
}
