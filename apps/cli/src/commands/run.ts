/**
 * corroborate run [--sources a,b] [--output dir] [--concurrency n] [--profile file]
 */
import { InvalidArgumentError, type Command } from 'commander';
import { confidenceLabel, loadConfig, setLogLevel } from '@corroborate/core';
import { readTargetProfile } from '@corroborate/agents';
import { runInventory } from '../orchestrator/run';
import type { InventoryRun } from '../orchestrator/types';

interface RunOptions {
  readonly sources?: string[];
  readonly output?: string;
  readonly concurrency: number;
  readonly profile?: string;
}

const TOP_ENTITIES = 10;

export function parseSourceList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

export function parseConcurrency(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('must be a positive integer');
  return n;
}

export function formatRunSummary(run: InventoryRun): string[] {
  const { summary } = run;
  const lines = [
    `Observations: ${summary.rawObservations}  Entities: ${summary.uniqueEntities}  High confidence: ${summary.highConfidence}`,
  ];
  for (const source of run.sources) {
    const status = source.status === 'ok' ? 'ok' : `failed (${source.error ?? 'unknown error'})`;
    lines.push(`  ${source.id.padEnd(8)} ${String(source.observations).padStart(5)} observations  ${status}`);
  }
  if (run.blockedOrigins.length > 0) {
    lines.push(`Blocked origins: ${run.blockedOrigins.map((b) => b.origin).join(', ')}`);
  }
  for (const [i, record] of run.result.records.slice(0, TOP_ENTITIES).entries()) {
    lines.push(
      `${String(i + 1).padStart(2)}. ${record.displayName} [${record.region || 'Unknown'}] score ${record.corroborationScore} (${confidenceLabel(record.corroborationScore)})`,
    );
  }
  return lines;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Collect observations from the selected sources and write the entity inventory')
    .option('-s, --sources <ids>', 'comma-separated source ids (default: all)', parseSourceList)
    .option('-o, --output <dir>', 'output directory (default: OUTPUT_DIR)')
    .option('-c, --concurrency <n>', 'sources run at the same time', parseConcurrency, 1)
    .option('-p, --profile <file>', 'target profile JSON replacing the bundled one')
    .action(async (options: RunOptions) => {
      const config = loadConfig();
      setLogLevel(config.logLevel);
      const profile = options.profile ? await readTargetProfile(options.profile) : undefined;

      const run = await runInventory({
        config,
        profile,
        sources: options.sources,
        concurrency: options.concurrency,
        outputDir: options.output ?? config.outputDir,
      });

      for (const line of formatRunSummary(run)) console.log(line);
      if (run.reportPath) console.log(`\nReport: ${run.reportPath}`);
    });
}
