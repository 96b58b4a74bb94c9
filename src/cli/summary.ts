/**
 * Migration Summary Display
 *
 * Formats run reports, validation results and run listings.
 */

import chalk from 'chalk';
import { TYPE_LABELS } from '../migrate/entities.js';
import type { MigrationReport, MigrationRun, RunStatus, RunValidation, TypeStatus } from '../migrate/index.js';

// ─── Styles ──────────────────────────────────────────────────

const RUN_STATUS_STYLE: Record<RunStatus, { icon: string; color: (s: string) => string; title: string }> = {
  created: { icon: '○', color: chalk.dim, title: 'Migration Created' },
  running: { icon: '…', color: chalk.cyan, title: 'Migration In Progress' },
  completed: { icon: '✓', color: chalk.green, title: 'Migration Complete' },
  'partially-completed': { icon: '⚠', color: chalk.yellow, title: 'Migration Partially Completed' },
  aborted: { icon: '✗', color: chalk.red, title: 'Migration Aborted' },
};

const TYPE_STATUS_COLOR: Record<TypeStatus, (s: string) => string> = {
  pending: chalk.dim,
  extracting: chalk.blue,
  extracted: chalk.blue,
  transforming: chalk.yellow,
  loading: chalk.magenta,
  completed: chalk.green,
  failed: chalk.red,
  skipped: chalk.yellow,
};

const RULE = '━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━';

/** Failures listed before the output is truncated. */
const MAX_FAILURES_SHOWN = 20;

// ─── Rendering ───────────────────────────────────────────────

/**
 * Report as display lines.
 */
export function renderReport(report: MigrationReport): string[] {
  const style = RUN_STATUS_STYLE[report.status];
  const lines: string[] = [
    '',
    style.color(chalk.bold(RULE)),
    style.color(chalk.bold(`  ${style.icon} ${style.title}`)),
    style.color(chalk.bold(RULE)),
    '',
    `  ${chalk.white('Run:')}     ${chalk.cyan(report.runId)}`,
    `  ${chalk.white('Project:')} ${chalk.cyan(report.projectKey)}`,
    '',
    chalk.white.bold('  Entity types:'),
  ];

  for (const type of report.types) {
    const { counts } = type;
    const label = TYPE_LABELS[type.entityType].padEnd(16);
    const status = TYPE_STATUS_COLOR[type.status](type.status.padEnd(12));
    const failed = counts.failed > 0 ? chalk.red(`${counts.failed} failed`) : chalk.dim('0 failed');
    lines.push(`    ${label} ${status} ${counts.loaded} loaded, ${failed}`);
    if (type.error) {
      lines.push(chalk.dim(`      ${type.error}`));
    }
  }

  lines.push('');
  lines.push(
    `  ${chalk.white('Totals:')} ${report.totals.loaded} loaded, ${report.totals.failed} failed, ` +
      `${report.totals.staged + report.totals.transformed} pending`,
  );

  if (report.failures.length > 0) {
    lines.push('');
    lines.push(chalk.red.bold('  Failures:'));
    for (const failure of report.failures.slice(0, MAX_FAILURES_SHOWN)) {
      lines.push(
        `    ${chalk.red('✗')} ${failure.entityType} ${failure.sourceId} ${chalk.dim(`[${failure.code}]`)} ${failure.reason}`,
      );
    }
    if (report.failures.length > MAX_FAILURES_SHOWN) {
      lines.push(chalk.dim(`    … and ${report.failures.length - MAX_FAILURES_SHOWN} more (use --json for all)`));
    }
  }

  lines.push('');
  return lines;
}

export function renderValidation(result: RunValidation): string[] {
  if (result.valid) {
    return [`${chalk.green('✓')} Run ${result.runId} is consistent`];
  }

  const lines = [`${chalk.red('✗')} Run ${result.runId} has ${result.issues.length} issue(s):`];
  for (const issue of result.issues) {
    lines.push(`    ${chalk.dim(`[${issue.code}]`)} ${issue.entityType} ${issue.sourceId}: ${issue.message}`);
  }
  return lines;
}

export function renderRuns(runs: MigrationRun[]): string[] {
  if (runs.length === 0) {
    return [chalk.dim('No migration runs yet.')];
  }
  return runs.map((run) => {
    const style = RUN_STATUS_STYLE[run.status];
    return `  ${style.color(style.icon)} ${chalk.cyan(run.id)}  ${run.projectKey}  ${run.status}  ${chalk.dim(run.startedAt)}`;
  });
}

// ─── Display ─────────────────────────────────────────────────

export function showReport(report: MigrationReport): void {
  for (const line of renderReport(report)) console.log(line);
}

export function showValidation(result: RunValidation): void {
  for (const line of renderValidation(result)) console.log(line);
}

export function showRuns(runs: MigrationRun[]): void {
  for (const line of renderRuns(runs)) console.log(line);
}
