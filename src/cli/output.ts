/**
 * Output formatters - Format output for CLI display.
 *
 * Core exports:
 * - formatError: Format error messages (stack trace only in verbose mode)
 * - handleError: Print an error and exit with a non-zero code
 * - formatRunResult: Human-readable summary of a version run
 * - toRunReport: JSON-friendly run summary with root-relative paths
 */

import * as path from 'node:path';
import chalk from 'chalk';
import { isStampverError } from '../common/errors.ts';
import type { RunResult } from '../engine/version-engine.ts';
import type { WriteResult, WriteStatus } from '../targets/types.ts';
import { describeMode } from '../version/bump-policy.ts';
import { renderVersion } from '../version/deriver.ts';

let verboseErrors = false;

/**
 * Include stack traces in formatted errors.
 */
export function setVerboseErrors(enabled: boolean): void {
  verboseErrors = enabled;
}

/**
 * Format an error for CLI output.
 */
export function formatError(error: Error | string, verbose: boolean = verboseErrors): string {
  if (typeof error === 'string') {
    return chalk.red('Error: ') + error;
  }

  const lines = [chalk.red.bold('Error:') + ' ' + chalk.red(error.message)];
  if (isStampverError(error)) {
    lines.push(chalk.gray(`  [${error.code}]`));
  }

  if (verbose && error.stack) {
    lines.push('');
    lines.push(chalk.gray('Stack trace:'));
    error.stack.split('\n').slice(1).forEach(line => {
      lines.push(chalk.gray(`  ${line.trim()}`));
    });
  }

  return lines.join('\n');
}

/**
 * Handle error and exit process.
 */
export function handleError(error: unknown): never {
  if (error instanceof Error) {
    console.error(formatError(error));
    process.exit(1);
  }

  console.error(chalk.red('Unknown error:'), error);
  process.exit(1);
}

function statusLabel(status: WriteStatus): string {
  const label = status.padEnd(9);
  switch (status) {
    case 'updated':
    case 'created':
      return chalk.green(label);
    case 'unchanged':
      return chalk.gray(label);
    case 'skipped':
      return chalk.yellow(label);
  }
}

function relativeTo(rootDir: string, file: string): string {
  return path.relative(rootDir, file) || file;
}

function formatWriteResult(result: WriteResult, rootDir: string): string {
  const reason = result.reason ? chalk.gray(` (${result.reason})`) : '';
  return `  ${statusLabel(result.status)} ${relativeTo(rootDir, result.file)} ${chalk.gray(result.version)}${reason}`;
}

export function formatRunResult(result: RunResult, rootDir: string): string {
  const from = renderVersion(result.previous, 'bare');
  const to = result.strings.bare;
  const lines: string[] = [];

  lines.push(
    result.mode.kind === 'skip'
      ? `${chalk.cyan('Version:')} ${chalk.bold(to)} ${chalk.gray('(unchanged)')}`
      : `${chalk.cyan('Version:')} ${from} -> ${chalk.bold(to)} ${chalk.gray(`(${describeMode(result.mode)})`)}`,
  );

  if (result.backward) {
    lines.push(
      chalk.yellow(
        result.mode.kind === 'override'
          ? `Warning: override moved the version backward from ${from} to ${to}`
          : `Warning: stored year is ahead of the clock, version reset from ${from} to ${to}`,
      ),
    );
  }

  if (result.results.length > 0) {
    lines.push(chalk.cyan('Targets:'));
    result.results.forEach(item => lines.push(formatWriteResult(item, rootDir)));
  }

  if (result.commit.committed) {
    lines.push(`${chalk.cyan('Committed:')} ${result.commit.message}`);
  } else if (result.commit.reason === 'skipped') {
    lines.push(chalk.gray('Git commit skipped'));
  } else {
    lines.push(chalk.gray('No files modified, nothing to commit'));
  }

  return lines.join('\n');
}

export interface RunReport {
  previous: string;
  version: string;
  strings: RunResult['strings'];
  mode: string;
  backward: boolean;
  results: WriteResult[];
  modifiedFiles: string[];
  commit: RunResult['commit'];
}

export function toRunReport(result: RunResult, rootDir: string): RunReport {
  return {
    previous: renderVersion(result.previous, 'bare'),
    version: result.strings.bare,
    strings: result.strings,
    mode: describeMode(result.mode),
    backward: result.backward,
    results: result.results.map(item => ({ ...item, file: relativeTo(rootDir, item.file) })),
    modifiedFiles: result.modifiedFiles.map(file => relativeTo(rootDir, file)),
    commit: result.commit,
  };
}
