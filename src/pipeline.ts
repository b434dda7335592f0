/**
 * Quarterly report pipeline
 *
 * load → derive keys → reconcile (gate) → enrich → aggregate → assemble
 *
 * `runPipeline` is the synchronous core over an already loaded snapshot;
 * `generateQuarterlyReport` adds loading and artifact writing around it.
 */

import { v4 as uuidv4 } from 'uuid';
import { logFlow } from './utils/logging.js';
import { describeError } from './utils/errors.js';
import { resolveReportPeriod } from './utils/report-calendar.js';
import type { ReportSettings } from './utils/report-settings.js';
import { deriveKeys } from './services/key-builder.js';
import { reconcileMappings } from './services/mapping-reconciler.js';
import { enrichFacts } from './services/fact-enricher.js';
import { CategoryAggregator } from './services/category-aggregator.js';
import { ReportRegistry } from './services/report-registry.js';
import { GAP_WORKBOOK_NAME, WorkbookWriter, reportWorkbookName } from './services/workbook-writer.js';
import type { DataLoader, LoadedSnapshot } from './services/data-loader.js';
import type { KeySpace } from './types/mapping.js';
import type { ReportPeriod, ReportTable } from './types/report.js';

export type PipelineResult =
  | { status: 'success'; period: ReportPeriod; tables: ReportTable[] }
  | { status: 'mapping-gap'; period: ReportPeriod; gaps: ReportTable[]; gapKeys: Readonly<Record<KeySpace, readonly string[]>> };

export type ArtifactResult = PipelineResult & { runId: string; artifactPath: string };

/**
 * Runs the core over one immutable snapshot. Returns the gap tables, and
 * computes nothing further, when any key space is not covered.
 */
export function runPipeline(
  snapshot: LoadedSnapshot,
  period: ReportPeriod,
  settings: ReportSettings,
  registry: ReportRegistry = new ReportRegistry()
): PipelineResult {
  const keyed = deriveKeys(snapshot.facts);
  const reconciliation = reconcileMappings(keyed, snapshot.mappings);

  if (!reconciliation.passed) {
    return { status: 'mapping-gap', period, gaps: reconciliation.gaps, gapKeys: reconciliation.gapKeys };
  }

  const facts = enrichFacts(keyed, snapshot.mappings);
  const aggregator = new CategoryAggregator(facts, period, settings.tagAttributePolicy);
  const codeLabels = new Map(snapshot.mappings.codeLabels.map(entry => [entry.code, entry.label] as const));

  const tables = registry.generateTables(
    { period, facts, aggregator, codeLabels, settings },
    settings.enabledReports
  );
  return { status: 'success', period, tables };
}

export interface QuarterlyReportOptions {
  reportDate: string;
  loader: DataLoader;
  settings: ReportSettings;
  writer?: WorkbookWriter;
  runId?: string;
}

/**
 * One report run: loads the snapshot, runs the core, and writes either the
 * report workbook or the gap workbook.
 */
export async function generateQuarterlyReport(options: QuarterlyReportOptions): Promise<ArtifactResult> {
  const runId = options.runId ?? uuidv4();
  const writer = options.writer ?? new WorkbookWriter();
  const period = resolveReportPeriod(options.reportDate);

  logFlow('PIPELINE', 'ENTRY', 'Starting quarterly report run', { runId, ...period });

  try {
    const snapshot = await options.loader.loadSnapshot(period);
    const result = runPipeline(snapshot, period, options.settings);

    if (result.status === 'mapping-gap') {
      const artifactPath = await writer.write(result.gaps, options.settings.mappingOutputDirs, GAP_WORKBOOK_NAME);
      logFlow('PIPELINE', 'EXIT', 'Update mapping: gap workbook written, no report produced', {
        runId,
        artifactPath,
        gapTables: result.gaps.map(table => table.name)
      });
      return { ...result, runId, artifactPath };
    }

    const artifactPath = await writer.write(
      result.tables,
      options.settings.reportOutputDirs,
      reportWorkbookName(period.reportDate)
    );
    logFlow('PIPELINE', 'EXIT', 'Report written', { runId, artifactPath, tables: result.tables.length });
    return { ...result, runId, artifactPath };
  } catch (error) {
    logFlow('PIPELINE', 'ERROR', 'Report run failed', { runId, error: describeError(error) });
    throw error;
  }
}
