// ABOUTME: Dataset ecosystem definitions: identifier lists, query syntax and retry behaviour
// ABOUTME: scikit-learn loaders are fixed; R dataset names come from an exported list file

import { NO_RETRY } from './retry-policy.js';
import type { DatasetQuery, Ecosystem, EcosystemDefinition, RetryPolicy } from './types.js';

export const SKLEARN_DATASETS: readonly string[] = [
  'load_iris',
  'load_diabetes',
  'load_digits',
  'load_linnerud',
  'load_wine',
  'load_breast_cancer',
];

const LABELS: Record<Ecosystem, string> = {
  sklearn: 'scikit-learn',
  r: 'R',
};

export function ecosystemLabel(ecosystem: Ecosystem): string {
  return LABELS[ecosystem];
}

export function sklearnEcosystem(): EcosystemDefinition {
  return {
    ecosystem: 'sklearn',
    label: LABELS.sklearn,
    buildQuery: (dataset) => `sklearn.datasets ${dataset} extension:py`,
    isSearchable: () => true,
    skipReason: 'that cannot be searched',
    retry: NO_RETRY,
  };
}

export function rEcosystem(retry: RetryPolicy): EcosystemDefinition {
  return {
    ecosystem: 'r',
    label: LABELS.r,
    buildQuery: (dataset) => `data(${dataset}) extension:r`,
    // TODO: search names like "beaver1 (beavers)" and "BJsales.lead (BJsales)" via their parent object
    isSearchable: (dataset) => !dataset.includes(' ') && !dataset.includes('.'),
    skipReason: 'containing spaces or periods',
    retry,
  };
}

/**
 * Split identifiers into queries for the searchable ones and the names that were filtered out
 */
export function buildQueries(
  definition: EcosystemDefinition,
  datasets: readonly string[]
): { queries: DatasetQuery[]; skipped: string[] } {
  const queries: DatasetQuery[] = [];
  const skipped: string[] = [];

  for (const dataset of datasets) {
    if (!definition.isSearchable(dataset)) {
      skipped.push(dataset);
      continue;
    }
    queries.push(Object.freeze({ dataset, query: definition.buildQuery(dataset) }));
  }

  return { queries, skipped };
}
