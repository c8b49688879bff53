/**
 * JSON inventory report: one file per day under the output directory.
 */
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { confidenceLabel, type BlockedOrigin, type InventorySummary } from '@corroborate/core';
import type { Confidence, EntityRecord, RejectionCounts } from '@corroborate/schemas';
import type { InventoryRun, SourceRunStats } from '../orchestrator/types';

export interface ReportEntity extends EntityRecord {
  confidenceLabel: Confidence;
}

export interface InventoryReport {
  generatedAt: string;
  startedAt: string;
  sources: Omit<SourceRunStats, 'errors'>[];
  skippedSources: string[];
  blockedOrigins: (Omit<BlockedOrigin, 'blockedAt'> & { blockedAt: string })[];
  rejected: RejectionCounts;
  summary: InventorySummary;
  entities: ReportEntity[];
}

export function reportFileName(date: Date): string {
  return `entity-inventory-${date.toISOString().slice(0, 10)}.json`;
}

export function buildInventoryReport(run: InventoryRun): InventoryReport {
  return {
    generatedAt: run.finishedAt.toISOString(),
    startedAt: run.startedAt.toISOString(),
    sources: run.sources.map(({ errors: _errors, ...stats }) => stats),
    skippedSources: run.skippedSources,
    blockedOrigins: run.blockedOrigins.map((b) => ({ ...b, blockedAt: b.blockedAt.toISOString() })),
    rejected: run.result.rejected,
    summary: run.summary,
    entities: run.result.records.map((record) => ({
      ...record,
      confidenceLabel: confidenceLabel(record.corroborationScore),
    })),
  };
}

/** Write the report and return its path. */
export async function writeInventoryReport(report: InventoryReport, outputDir: string): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const path = join(outputDir, reportFileName(new Date(report.generatedAt)));
  await writeFile(path, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
  return path;
}
