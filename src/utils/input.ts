import type { ExpectedLinkRow } from '../types/linkCheck';
import { ensureScheme, normalizeHostInput } from './url';

export interface LinkRowInput {
  site?: string;
  link?: string;
  anchor?: string;
}

/** Splits CSV text into records; quoted fields may hold commas, newlines and `""` escapes. */
export function parseCsvRecords(content: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let i = 0; i < content.length; i++) {
    const char = content[i];

    if (inQuotes) {
      if (char === '"' && content[i + 1] === '"') {
        field += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"' && field.length === 0) {
      inQuotes = true;
    } else if (char === ',') {
      record.push(field);
      field = '';
    } else if (char === '\n') {
      record.push(field);
      records.push(record);
      record = [];
      field = '';
    } else if (char !== '\r') {
      field += char;
    }
  }

  if (field.length > 0 || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  return records;
}

function toRow(rowNum: number, input: LinkRowInput): ExpectedLinkRow | null {
  const site = (input.site ?? '').trim();
  const link = (input.link ?? '').trim();
  if (!site || !link) {
    return null;
  }
  return { rowNum, site: ensureScheme(site), link, anchor: (input.anchor ?? '').trim() };
}

/**
 * Reads `site,link[,anchor]` records. `rowNum` is the 1-based record position,
 * so skipped records still advance the numbering.
 */
export function parseLinkCsv(csv: string): ExpectedLinkRow[] {
  const rows: ExpectedLinkRow[] = [];
  parseCsvRecords(csv.trim()).forEach((cells, index) => {
    if (cells.length < 2) return;
    const row = toRow(index + 1, { site: cells[0], link: cells[1], anchor: cells[2] });
    if (row) rows.push(row);
  });
  return rows;
}

export function rowsFromInput(inputs: readonly LinkRowInput[]): ExpectedLinkRow[] {
  const rows: ExpectedLinkRow[] = [];
  inputs.forEach((input, index) => {
    const row = toRow(index + 1, input);
    if (row) rows.push(row);
  });
  return rows;
}

/** Newline- or comma-separated hosts, reduced to bare host form. Empty entries are dropped. */
export function parseHostList(raw: string | readonly string[]): string[] {
  const entries = typeof raw === 'string' ? raw.split(/[\n,]/) : raw.flatMap((entry) => entry.split(/[\n,]/));
  return entries.map(normalizeHostInput).filter((host) => host.length > 0);
}
