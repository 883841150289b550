// ABOUTME: Orchestrates one report run: both ecosystem query phases, CSV output, then the chart
// ABOUTME: Phases run strictly in sequence; the chart is drawn from the tables as written

import { ChartRenderer } from './chart-renderer.js';
import { loadDatasetList } from './dataset-list.js';
import { rEcosystem, SKLEARN_DATASETS, sklearnEcosystem } from './ecosystems.js';
import { readResultTable, writeResultTable } from './result-table.js';
import type { Sleep } from './retry-policy.js';
import { type CodeSearchClient, type EcosystemRun, SearchRunner } from './search-runner.js';
import type { AppConfig } from './types.js';

export interface ReportDependencies {
  client: CodeSearchClient;
  sleep?: Sleep;
  chartRenderer?: ChartRenderer;
}

export interface ReportResult {
  sklearn: EcosystemRun;
  r: EcosystemRun;
  chartPath?: string;
}

export async function runReport(config: AppConfig, deps: ReportDependencies): Promise<ReportResult> {
  // Read the input list before any request so a bad file fails fast
  const rDatasets = await loadDatasetList(config.rDatasetsListPath);
  const runner = new SearchRunner(deps.client, { sleep: deps.sleep });

  const sklearn = await runner.runEcosystem(sklearnEcosystem(), SKLEARN_DATASETS);
  await writeResultTable(sklearn.table, config.sklearnOutputPath);

  const r = await runner.runEcosystem(rEcosystem(config.retry), rDatasets);
  await writeResultTable(r.table, config.rOutputPath);

  if (!config.chart.enabled) {
    return { sklearn, r };
  }

  const tables = [
    await readResultTable('sklearn', config.sklearnOutputPath),
    await readResultTable('r', config.rOutputPath),
  ];
  const renderer = deps.chartRenderer ?? new ChartRenderer();
  const chartPath = await renderer.render(tables, config.chart);

  return { sklearn, r, chartPath };
}
