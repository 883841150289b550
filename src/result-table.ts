// ABOUTME: Persists per-ecosystem query results as two-column CSV files
// ABOUTME: Writes with a dataset,total_count header and reads tables back for charting

import * as fs from 'fs/promises';
import Papa from 'papaparse';
import { ResultTableError } from './errors.js';
import type { Ecosystem, QueryResult, ResultTable } from './types.js';

export const RESULT_COLUMNS = ['dataset', 'total_count'] as const;

/**
 * Write a result table, replacing any existing file
 */
export async function writeResultTable(table: ResultTable, filePath: string): Promise<void> {
  const csv = Papa.unparse(
    {
      fields: [...RESULT_COLUMNS],
      data: table.rows.map(row => [row.dataset, row.totalCount]),
    },
    { newline: '\n' }
  );

  // unparse already ends a header-only table with a newline
  await fs.writeFile(filePath, csv.endsWith('\n') ? csv : `${csv}\n`, 'utf-8');
  console.error(`[ResultTable] Wrote ${table.rows.length} rows to ${filePath}`);
}

export async function readResultTable(ecosystem: Ecosystem, filePath: string): Promise<ResultTable> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ResultTableError(`Failed to read result table: ${message}`, filePath);
  }

  const parsed = Papa.parse<Record<string, string | undefined>>(content, {
    header: true,
    skipEmptyLines: true,
  });

  const fields = parsed.meta.fields ?? [];
  for (const column of RESULT_COLUMNS) {
    if (!fields.includes(column)) {
      throw new ResultTableError(`Result table is missing the "${column}" column`, filePath);
    }
  }

  const rows: QueryResult[] = parsed.data.map((record, index) => {
    const dataset = record.dataset?.trim();
    const count = record.total_count?.trim();

    if (!dataset) {
      throw new ResultTableError(`Row ${index + 1} has no dataset name`, filePath);
    }
    if (!count || !/^\d+$/.test(count)) {
      throw new ResultTableError(`Row ${index + 1} (${dataset}) has an invalid total_count: "${count ?? ''}"`, filePath);
    }

    return { dataset, totalCount: parseInt(count, 10) };
  });

  return { ecosystem, rows };
}
