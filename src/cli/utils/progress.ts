/**
 * Progress Reporter
 *
 * Manages progress display for long-running indexing operations.
 * Supports multiple output modes:
 * - Interactive: ora spinners with real-time updates
 * - JSON: NDJSON event stream for scripting
 * - Text: Simple text output for non-TTY environments
 *
 * Spinner updates are throttled (100ms minimum).
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

import type {
  IndexingStage,
  IndexPipelineResult,
  StageStats,
} from '../../indexer/pipeline.js';

/**
 * Human-readable labels for each stage.
 */
const STAGE_LABELS: Record<IndexingStage, string> = {
  loading: 'Loading',
  splitting: 'Splitting',
  embedding: 'Embedding',
  storing: 'Storing',
};

export interface ProgressReporterOptions {
  /** Output as JSON events instead of human-readable text */
  json: boolean;

  /** Show warnings while spinners run */
  verbose: boolean;

  /** Disable colors (respects NO_COLOR env) */
  noColor: boolean;

  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;
}

export type ProgressEventType =
  | 'stage_start'
  | 'stage_progress'
  | 'stage_complete'
  | 'warning'
  | 'complete';

/**
 * JSON event emitted in --json mode.
 */
export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  stage?: IndexingStage;
  data: Record<string, unknown>;
}

/**
 * Usage:
 * ```typescript
 * const reporter = createProgressReporter({ json: false });
 *
 * reporter.startStage('embedding', 120);
 * reporter.updateProgress(64);
 * reporter.completeStage({ stage: 'embedding', processed: 120, total: 120, durationMs: 900 });
 *
 * reporter.showSummary(result);
 * ```
 */
export class ProgressReporter {
  private options: ProgressReporterOptions;
  private spinner: Ora | null = null;
  private currentStage: IndexingStage | null = null;
  private currentTotal = 0;
  private lastUpdateTime = 0;

  private static readonly UPDATE_THROTTLE_MS = 100;

  constructor(options: ProgressReporterOptions) {
    this.options = options;

    if (options.noColor) {
      chalk.level = 0;
    }
  }

  /**
   * @param total - Expected total items (0 if unknown, as while loading)
   */
  startStage(stage: IndexingStage, total = 0): void {
    this.currentStage = stage;
    this.currentTotal = total;

    if (this.options.json) {
      this.emitJson({ type: 'stage_start', stage, data: { total } });
      return;
    }

    const label = STAGE_LABELS[stage];
    if (this.options.isInteractive) {
      this.spinner?.stop();
      this.spinner = ora({
        text: `${label}...`,
        prefixText: chalk.cyan(label.padEnd(12)),
      }).start();
    } else {
      console.log(`${label}...`);
    }
  }

  updateProgress(processed: number): void {
    if (!this.currentStage) return;

    const now = performance.now();
    if (now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    if (this.options.json) {
      this.emitJson({
        type: 'stage_progress',
        stage: this.currentStage,
        data: { processed, total: this.currentTotal },
      });
      return;
    }

    if (this.spinner && this.currentTotal > 0) {
      const percentage = Math.round((processed / this.currentTotal) * 100);
      this.spinner.text = `${processed}/${this.currentTotal} (${percentage}%)`;
    }
  }

  completeStage(stats: StageStats): void {
    if (this.options.json) {
      this.emitJson({
        type: 'stage_complete',
        stage: stats.stage,
        data: {
          processed: stats.processed,
          total: stats.total,
          durationMs: stats.durationMs,
          details: stats.details,
        },
      });
    } else if (this.spinner) {
      this.spinner.succeed(`${stats.processed.toLocaleString()} ${stageUnit(stats.stage)}`);
    } else {
      console.log(
        `${STAGE_LABELS[stats.stage]} complete: ${stats.processed.toLocaleString()} ${stageUnit(stats.stage)}`
      );
    }

    this.currentStage = null;
    this.spinner = null;
  }

  warn(message: string): void {
    if (this.options.json) {
      this.emitJson({
        type: 'warning',
        stage: this.currentStage ?? undefined,
        data: { message },
      });
      return;
    }

    // Warnings would break the spinner line; only verbose mode shows them live
    if (this.options.verbose || !this.options.isInteractive) {
      console.warn(chalk.yellow(`Warning: ${message}`));
    }
  }

  showSummary(result: IndexPipelineResult): void {
    if (this.options.json) {
      this.emitJson({ type: 'complete', data: { result } });
      return;
    }

    console.log('');
    console.log(
      result.dryRun ? chalk.bold('Dry Run (nothing stored)') : chalk.green.bold('Index Complete ✓')
    );
    console.log('');
    console.log(`  ${chalk.dim('Repository:')}       ${result.repoPath}`);
    console.log(`  ${chalk.dim('Files loaded:')}     ${result.filesLoaded.toLocaleString()}`);
    console.log(`  ${chalk.dim('Files skipped:')}    ${result.filesSkipped.toLocaleString()}`);
    console.log(`  ${chalk.dim('Chunks:')}           ${result.chunksSplit.toLocaleString()}`);
    if (!result.dryRun) {
      console.log(`  ${chalk.dim('Chunks stored:')}    ${result.chunksStored.toLocaleString()}`);
    }
    console.log(`  ${chalk.dim('Time elapsed:')}     ${formatDuration(result.totalDurationMs)}`);

    const kinds = Object.entries(result.byKind);
    if (kinds.length > 0) {
      console.log('');
      console.log(chalk.dim('  By kind:'));
      for (const [kind, count] of kinds) {
        console.log(`    ${kind.padEnd(10)}${count.toLocaleString()}`);
      }
    }

    if (result.warnings.length > 0) {
      console.log('');
      console.log(chalk.yellow(`  ${result.warnings.length} warning(s) during indexing`));
      if (this.options.verbose) {
        for (const warning of result.warnings.slice(0, 5)) {
          console.log(chalk.dim(`    - ${warning}`));
        }
        if (result.warnings.length > 5) {
          console.log(chalk.dim(`    ... and ${result.warnings.length - 5} more`));
        }
      }
    }

    console.log('');
  }

  private emitJson(event: Omit<ProgressEvent, 'timestamp'>): void {
    const full: ProgressEvent = { ...event, timestamp: new Date().toISOString() };
    console.log(JSON.stringify(full));
  }
}

function stageUnit(stage: IndexingStage): string {
  switch (stage) {
    case 'loading':
      return 'chunks loaded';
    case 'splitting':
      return 'chunks after split';
    case 'embedding':
      return 'chunks embedded';
    case 'storing':
      return 'chunks stored';
  }
}

/**
 * Format milliseconds as human-readable duration.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/**
 * Create a ProgressReporter with defaults from the environment.
 */
export function createProgressReporter(
  options: Partial<ProgressReporterOptions> = {}
): ProgressReporter {
  return new ProgressReporter({
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    noColor: options.noColor ?? !!process.env.NO_COLOR,
    isInteractive: options.isInteractive ?? process.stdout.isTTY ?? false,
  });
}
