/**
 * Progress Display
 *
 * Progress indicators for migration phases.
 * One ora spinner per entity type and phase.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import { TYPE_LABELS } from '../migrate/entities.js';
import type { EntityType, MigrationEvent, MigrationPhase, ProgressCounts } from '../migrate/index.js';

// ─── Types ───────────────────────────────────────────────────

export interface ProgressDisplayOptions {
  /** Disable colors */
  noColor?: boolean;
  /** Verbose output */
  verbose?: boolean;
}

// ─── Phase Icons & Labels ────────────────────────────────────

const PHASE_CONFIG: Record<MigrationPhase, { icon: string; label: string }> = {
  pending: { icon: '○', label: 'Pending' },
  extracting: { icon: '📤', label: 'Extracting' },
  transforming: { icon: '🔄', label: 'Transforming' },
  loading: { icon: '📥', label: 'Loading' },
  complete: { icon: '✓', label: 'Complete' },
};

// ─── Progress Display Class ──────────────────────────────────

export class ProgressDisplay {
  private spinner: Ora | null = null;
  private currentPhase: MigrationPhase = 'pending';
  private currentType: EntityType | null = null;
  private phaseStartTime = 0;
  private readonly verbose: boolean;
  private readonly noColor: boolean;

  constructor(options: ProgressDisplayOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.noColor = options.noColor ?? false;
  }

  /**
   * Handle migration events
   */
  handleEvent = (event: MigrationEvent): void => {
    switch (event.type) {
      case 'phase:start':
        if (event.phase && event.entityType) this.startPhase(event.phase, event.entityType);
        break;
      case 'phase:complete':
        if (event.phase === 'extracting') this.completePhase(event.message);
        break;
      case 'type:complete':
        this.completePhase();
        break;
      case 'progress':
        if (event.progress) this.updateProgress(event.progress);
        break;
      case 'checkpoint':
        if (this.verbose && event.message) {
          this.log(chalk.dim(`  ⟳ ${event.message}`));
        }
        break;
      case 'error':
        this.failPhase(event.error?.message ?? 'Unknown error');
        break;
      case 'type:start':
      case 'complete':
        break;
    }
  };

  /**
   * Start a phase for one entity type. Repeated starts of the same phase
   * and type (fixed-point rounds) keep the running spinner.
   */
  startPhase(phase: MigrationPhase, entityType: EntityType): void {
    if (this.spinner && this.currentPhase === phase && this.currentType === entityType) return;

    if (this.spinner && this.currentType !== entityType) {
      this.spinner.stop();
      this.spinner = null;
    }
    if (!this.spinner) {
      this.phaseStartTime = Date.now();
    }

    this.currentPhase = phase;
    this.currentType = entityType;
    const text = this.label();

    if (this.spinner) {
      this.spinner.text = text;
    } else {
      this.spinner = ora({ text, color: this.noColor ? undefined : 'cyan' }).start();
    }
  }

  /**
   * Complete the current type
   */
  completePhase(message?: string): void {
    if (!this.spinner) return;
    const elapsed = this.formatElapsed(Date.now() - this.phaseStartTime);
    this.spinner.succeed(`${message ?? this.label()} ${chalk.dim(`(${elapsed})`)}`);
    this.spinner = null;
  }

  /**
   * Fail current phase
   */
  failPhase(errorMessage: string): void {
    if (this.spinner) {
      this.spinner.fail(`Failed: ${errorMessage}`);
      this.spinner = null;
    }
  }

  /**
   * Show running totals next to the phase label
   */
  updateProgress(progress: ProgressCounts): void {
    if (!this.spinner) return;

    const parts: string[] = [];
    if (progress.itemsStaged !== undefined) parts.push(`${progress.itemsStaged} staged`);
    if (progress.pagesFetched !== undefined) parts.push(`${progress.pagesFetched} page(s)`);
    if (progress.loaded !== undefined) parts.push(`${progress.loaded} loaded`);
    if (progress.failed) parts.push(chalk.red(`${progress.failed} failed`));

    this.spinner.text = parts.length > 0 ? `${this.label()} ${chalk.dim(parts.join(', '))}` : this.label();
  }

  /**
   * Log a message (preserving spinner)
   */
  log(message: string): void {
    if (this.spinner) {
      this.spinner.stop();
      console.log(message);
      this.spinner.start();
    } else {
      console.log(message);
    }
  }

  /**
   * Stop spinner (cleanup)
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  // ─── Helpers ─────────────────────────────────────────────────

  private label(): string {
    const config = PHASE_CONFIG[this.currentPhase];
    const type = this.currentType ? TYPE_LABELS[this.currentType].toLowerCase() : '';
    return `${config.icon} ${config.label} ${type}`.trim();
  }

  private formatElapsed(ms: number): string {
    if (ms < 1000) return `${ms}ms`;
    if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
    const minutes = Math.floor(ms / 60000);
    const seconds = Math.round((ms % 60000) / 1000);
    return `${minutes}m ${seconds}s`;
  }
}

// ─── Convenience Functions ───────────────────────────────────

/**
 * Show a success message with checkmark
 */
export function success(message: string): void {
  console.log(chalk.green('✓') + ' ' + message);
}

/**
 * Show a warning message
 */
export function warning(message: string): void {
  console.log(chalk.yellow('⚠') + ' ' + message);
}

/**
 * Show an error message
 */
export function error(message: string): void {
  console.error(chalk.red('✗') + ' ' + message);
}
