/**
 * Validation utilities for the pillar input trees
 * Provides user-friendly error messages and formatting
 */

import { z } from 'zod';
import chalk from 'chalk';
import { ProvidersSchema } from './providers.schema';
import { ServersSchema } from './servers.schema';
import { CloudDefaultsSchema } from './defaults.schema';
import type { CloudInputs } from '../types/cloud';
import type { RawCloudInputs } from '../utils/config';
import { ok, err, type Result } from '../types/result';

export type InputTree = keyof RawCloudInputs;

const INPUT_TREES: readonly InputTree[] = ['providers', 'servers', 'defaults'];

/**
 * Validation error with path and message
 */
export interface ValidationIssue {
  tree: InputTree;
  path: string;
  message: string;
  code: string;
}

/**
 * Per-tree validation outcome, for reports
 */
export type TreeReport = Record<InputTree, ValidationIssue[]>;

/**
 * Format Zod path to readable string: aws.subnets.test[0]
 */
export function formatPath(path: PropertyKey[]): string {
  if (path.length === 0) return 'root';

  return path.map((segment, index) => {
    if (typeof segment === 'number') {
      return `[${segment}]`;
    }
    if (typeof segment === 'symbol') {
      return `[Symbol(${segment.description ?? ''})]`;
    }
    return index === 0 ? segment : `.${segment}`;
  }).join('');
}

function transformZodErrors(tree: InputTree, error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    tree,
    path: formatPath(issue.path),
    message: issue.message,
    code: issue.code,
  }));
}

function validateTree<T>(
  tree: InputTree,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): Result<T, ValidationIssue[]> {
  const result = schema.safeParse(data);
  if (result.success) {
    return ok(result.data);
  }
  return err(transformZodErrors(tree, result.error));
}

/**
 * Validate all three trees, collecting every issue
 */
export function validateCloudInputs(raw: RawCloudInputs): Result<CloudInputs, ValidationIssue[]> {
  const providers = validateTree('providers', ProvidersSchema, raw.providers);
  const servers = validateTree('servers', ServersSchema, raw.servers);
  const defaults = validateTree('defaults', CloudDefaultsSchema, raw.defaults);

  if (providers.success && servers.success && defaults.success) {
    return ok({ providers: providers.data, servers: servers.data, defaults: defaults.data });
  }

  return err([
    ...(providers.success ? [] : providers.error),
    ...(servers.success ? [] : servers.error),
    ...(defaults.success ? [] : defaults.error),
  ]);
}

/**
 * Group issues by tree, every tree present
 */
export function groupIssues(issues: readonly ValidationIssue[]): TreeReport {
  const report: TreeReport = { providers: [], servers: [], defaults: [] };
  for (const issue of issues) {
    report[issue.tree].push(issue);
  }
  return report;
}

/**
 * Get human-readable suggestions for common errors
 */
export function getSuggestion(issue: ValidationIssue): string | null {
  if (issue.code === 'invalid_union' && issue.path.includes('subnets')) {
    return 'Declare subnets as "- { zone: A, subnet: subnet-123 }" or "- A: subnet-123"';
  }

  const suggestions: Record<string, string> = {
    invalid_type: 'Check that the field exists and has the correct type',
    too_small: 'This field requires at least one item',
    invalid_string: 'Check the format requirements for this field',
    unrecognized_keys: 'Remove the unknown keys',
  };

  return suggestions[issue.code] ?? null;
}

/**
 * Format validation errors for console output
 */
export function formatValidationErrors(issues: readonly ValidationIssue[]): string {
  const lines: string[] = [
    '',
    chalk.red.bold('✗ Pillar validation failed'),
    '',
  ];

  for (const issue of issues) {
    lines.push(chalk.yellow(`  → ${issue.tree}.${issue.path}`));
    lines.push(chalk.white(`    ${issue.message}`));
    lines.push('');
  }

  lines.push(chalk.gray('  Run `cloudmap validate` for detailed validation'));

  return lines.join('\n');
}

/**
 * Print detailed validation report
 */
export function printValidationReport(report: TreeReport): void {
  console.log('');
  console.log(chalk.bold('Pillar Validation Report'));
  console.log(chalk.gray('─'.repeat(40)));
  console.log('');

  for (const tree of INPUT_TREES) {
    const issues = report[tree];
    if (issues.length === 0) {
      console.log(chalk.green(`✓ ${tree}: Valid`));
      continue;
    }

    console.log(chalk.red(`✗ ${tree}: Invalid`));
    for (const issue of issues) {
      console.log(chalk.yellow(`    ${issue.path}: ${issue.message}`));
      const suggestion = getSuggestion(issue);
      if (suggestion) {
        console.log(chalk.gray(`      💡 ${suggestion}`));
      }
    }
  }

  console.log('');
  console.log(chalk.gray('─'.repeat(40)));

  const allValid = Object.values(report).every(issues => issues.length === 0);
  if (allValid) {
    console.log(chalk.green.bold('All input trees are valid! ✓'));
  } else {
    console.log(chalk.red.bold('Please fix the validation errors above.'));
  }
  console.log('');
}
