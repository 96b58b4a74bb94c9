/**
 * Signal Handler
 *
 * Graceful handling of Ctrl+C (SIGINT) and SIGTERM. The first signal asks
 * the orchestrator to stop after the current page or batch; the second
 * quits immediately.
 */

import chalk from 'chalk';
import type { MigrationOrchestrator } from '../migrate/index.js';

// ─── Types ───────────────────────────────────────────────────

export interface SignalHandlerOptions {
  /** Orchestrator to cancel on interrupt */
  orchestrator?: MigrationOrchestrator;
  /** Called on force quit, before exiting */
  cleanup?: () => void;
  /** Exit hook (tests replace it) */
  exit?: (code: number) => void;
}

// ─── Signal Handler Class ────────────────────────────────────

export class SignalHandler {
  private orchestrator?: MigrationOrchestrator;
  private readonly cleanup?: () => void;
  private readonly exit: (code: number) => void;
  private interruptCount = 0;

  constructor(options: SignalHandlerOptions = {}) {
    this.orchestrator = options.orchestrator;
    this.cleanup = options.cleanup;
    this.exit = options.exit ?? ((code) => process.exit(code));
  }

  /**
   * Register signal handlers
   */
  register(): void {
    process.on('SIGINT', this.handleInterrupt);
    process.on('SIGTERM', this.handleInterrupt);
  }

  /**
   * Unregister signal handlers
   */
  unregister(): void {
    process.off('SIGINT', this.handleInterrupt);
    process.off('SIGTERM', this.handleInterrupt);
  }

  /**
   * Update the orchestrator reference
   */
  setOrchestrator(orchestrator: MigrationOrchestrator): void {
    this.orchestrator = orchestrator;
  }

  /** Number of signals received so far. */
  get interrupts(): number {
    return this.interruptCount;
  }

  /**
   * Handle SIGINT/SIGTERM
   */
  handleInterrupt = (): void => {
    this.interruptCount++;

    // Force exit on second interrupt
    if (this.interruptCount > 1) {
      console.log();
      console.log(chalk.red('Force quit.'));
      this.cleanup?.();
      this.exit(130);
      return;
    }

    console.log();
    console.log(chalk.yellow.bold('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
    console.log(chalk.yellow.bold('  ⏸ Migration Interrupted'));
    console.log(chalk.yellow.bold('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
    console.log();

    const runId = this.orchestrator?.activeRunId;
    if (this.orchestrator) {
      this.orchestrator.cancel();
      console.log(chalk.yellow('  Finishing the current page or batch...'));
      if (runId) {
        console.log(chalk.dim(`  Resume with: ${chalk.cyan(`tm-migrate migrate --run ${runId}`)}`));
      }
    }
    console.log(chalk.dim('  Press Ctrl+C again to force quit.'));
    console.log();
  };
}

// ─── Convenience Function ────────────────────────────────────

let globalHandler: SignalHandler | null = null;

/**
 * Setup global signal handling
 */
export function setupSignalHandler(options: SignalHandlerOptions = {}): SignalHandler {
  if (globalHandler) {
    globalHandler.unregister();
  }

  globalHandler = new SignalHandler(options);
  globalHandler.register();
  return globalHandler;
}

/**
 * Get the current signal handler
 */
export function getSignalHandler(): SignalHandler | null {
  return globalHandler;
}

/**
 * Cleanup signal handling
 */
export function cleanupSignalHandler(): void {
  if (globalHandler) {
    globalHandler.unregister();
    globalHandler = null;
  }
}
