// ABOUTME: Tests for writing and reading the per-ecosystem CSV result tables
// ABOUTME: Checks the exact file layout, round-trip order and validation of bad rows

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { readResultTable, writeResultTable } from '../result-table.js';
import { ResultTableError } from '../errors.js';
import type { ResultTable } from '../types.js';

describe('result tables', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'result-table-'));
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  const table: ResultTable = {
    ecosystem: 'sklearn',
    rows: [
      { dataset: 'load_iris', totalCount: 120 },
      { dataset: 'load_wine', totalCount: 45 },
      { dataset: 'load_linnerud', totalCount: 0 },
    ],
  };

  it('writes a header row and one row per result', async () => {
    const file = path.join(dir, 'sklearn.csv');
    await writeResultTable(table, file);

    const content = await fs.readFile(file, 'utf-8');
    expect(content).toBe('dataset,total_count\nload_iris,120\nload_wine,45\nload_linnerud,0\n');
  });

  it('writes only the header for an empty table', async () => {
    const file = path.join(dir, 'empty.csv');
    await writeResultTable({ ecosystem: 'r', rows: [] }, file);

    expect(await fs.readFile(file, 'utf-8')).toBe('dataset,total_count\n');
    await expect(readResultTable('r', file)).resolves.toEqual({ ecosystem: 'r', rows: [] });
  });

  it('ends the file with exactly one newline whatever the row count', async () => {
    const empty = path.join(dir, 'empty.csv');
    const single = path.join(dir, 'single.csv');
    await writeResultTable({ ecosystem: 'r', rows: [] }, empty);
    await writeResultTable({ ecosystem: 'r', rows: [{ dataset: 'iris', totalCount: 7 }] }, single);

    expect((await fs.readFile(empty, 'utf-8')).split('\n')).toEqual(['dataset,total_count', '']);
    expect((await fs.readFile(single, 'utf-8')).split('\n')).toEqual(['dataset,total_count', 'iris,7', '']);
  });

  it('reads back identical pairs in the same order', async () => {
    const file = path.join(dir, 'sklearn.csv');
    await writeResultTable(table, file);

    await expect(readResultTable('sklearn', file)).resolves.toEqual(table);
  });

  it('overwrites an existing file', async () => {
    const file = path.join(dir, 'r.csv');
    await writeResultTable({ ecosystem: 'r', rows: [{ dataset: 'iris', totalCount: 1 }] }, file);
    await writeResultTable({ ecosystem: 'r', rows: [{ dataset: 'cars', totalCount: 2 }] }, file);

    expect(await fs.readFile(file, 'utf-8')).toBe('dataset,total_count\ncars,2\n');
  });

  it('rejects a table without the expected columns', async () => {
    const file = path.join(dir, 'bad.csv');
    await fs.writeFile(file, 'name,count\niris,3\n');

    await expect(readResultTable('r', file)).rejects.toThrow('missing the "dataset" column');
  });

  it('rejects rows with a non-integer count', async () => {
    const file = path.join(dir, 'bad.csv');
    await fs.writeFile(file, 'dataset,total_count\niris,many\n');

    const read = readResultTable('r', file);
    await expect(read).rejects.toBeInstanceOf(ResultTableError);
    await expect(read).rejects.toThrow('Row 1 (iris) has an invalid total_count: "many"');
  });

  it('rejects a missing file', async () => {
    await expect(readResultTable('r', path.join(dir, 'missing.csv'))).rejects.toThrow('Failed to read result table');
  });
});
