// ABOUTME: Loads the list of R dataset names exported from the base datasets package
// ABOUTME: Expects a JSON array of strings as written by jsonlite::write_json

import * as fs from 'fs/promises';
import { DatasetListError } from './errors.js';

export async function loadDatasetList(listPath: string): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(listPath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DatasetListError(`Failed to read dataset list: ${message}`, listPath);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DatasetListError(`Dataset list is not valid JSON: ${message}`, listPath);
  }

  if (!Array.isArray(parsed)) {
    throw new DatasetListError('Dataset list must be a JSON array of names', listPath);
  }

  const names: string[] = [];
  for (const [index, value] of parsed.entries()) {
    if (typeof value !== 'string' || value.trim() === '') {
      throw new DatasetListError(`Entry ${index} is not a dataset name: ${JSON.stringify(value)}`, listPath);
    }
    names.push(value);
  }

  return names;
}
