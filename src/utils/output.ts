/**
 * Output formatting utilities
 */

import chalk from 'chalk';
import type { Diagnostic } from '../core/diagnostics';

export const colors = {
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
  bold: chalk.bold,
};

export function printSuccess(message: string): void {
  console.log(colors.success(`✓ ${message}`));
}

export function printError(message: string): void {
  console.error(colors.error(`✗ ${message}`));
}

export function printWarning(message: string): void {
  console.log(colors.warning(`⚠ ${message}`));
}

export function printInfo(message: string): void {
  console.log(colors.info(`→ ${message}`));
}

export function printBlank(): void {
  console.log('');
}

export function printRaw(message: string): void {
  console.log(message);
}

export function printSection(title: string): void {
  console.log('');
  console.log(colors.info(`=== ${title} ===`));
}

/**
 * Where a diagnostic was raised, e.g. "aws/test/web"
 */
export function formatScope(diagnostic: Diagnostic): string {
  return [diagnostic.provider, diagnostic.environment, diagnostic.role]
    .filter((part): part is string => part !== undefined)
    .join('/');
}

export function printDiagnostic(diagnostic: Diagnostic): void {
  const scope = formatScope(diagnostic);
  const message = scope ? `${diagnostic.message} ${colors.dim(`[${scope}]`)}` : diagnostic.message;

  if (diagnostic.severity === 'error') {
    printError(message);
  } else {
    printWarning(message);
  }
}

/**
 * Pluralize a counted noun: 1 profile, 2 profiles
 */
export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
