/**
 * Generate command
 * Expands the pillar into salt-cloud provider, profile and map files
 */

import type { Command } from 'commander';
import ora from 'ora';
import { consumeMap, hasErrors, summarizeConfig } from '../core';
import { PersistenceService, type ApplyReport } from '../services';
import { CLIError, ErrorCode, withErrorHandler } from '../utils/errors';
import { resolveOwnership } from '../utils/owner';
import {
  colors,
  plural,
  printBlank,
  printDiagnostic,
  printInfo,
  printRaw,
  printSection,
  printSuccess,
  printWarning,
} from '../utils/output';
import { requireCloudInputs, withPillarOptions, type PillarOptions } from './pillar';
import { DEFAULT_CONF_DIR } from '../constants';

interface GenerateOptions extends PillarOptions {
  confDir: string;
  fileMode: string;
  dirMode: string;
  user?: string;
  group?: string;
  dryRun?: boolean;
  diff?: boolean;
  json?: boolean;
  strict?: boolean;
}

/**
 * Parse an octal permission string such as 0600
 */
export function parseMode(value: string, option: string): number {
  if (!/^0?[0-7]{3}$/.test(value)) {
    throw new CLIError(
      `Invalid ${option}: ${value}`,
      ErrorCode.INVALID_ARGUMENT,
      'Use an octal mode such as 0600'
    );
  }
  return parseInt(value, 8);
}

function printReport(report: ApplyReport, showDiff: boolean): void {
  const verb = report.dryRun ? 'Would create' : 'Created';

  for (const dir of report.directories) {
    printInfo(`${verb} directory ${dir}`);
  }

  let unchanged = 0;
  for (const file of report.files) {
    if (file.status === 'unchanged') {
      unchanged++;
      continue;
    }

    if (file.status === 'created') {
      printSuccess(`${verb} ${file.path}`);
    } else if (file.diff) {
      printSuccess(`${report.dryRun ? 'Would update' : 'Updated'} ${file.path}`);
      if (showDiff) {
        printRaw(colors.dim(file.diff));
      }
    } else {
      const was: string[] = [];
      if (file.previousMode !== undefined) {
        was.push(`mode ${file.previousMode.toString(8)}`);
      }
      if (file.previousOwner) {
        was.push(`owner ${file.previousOwner.uid}:${file.previousOwner.gid}`);
      }
      printSuccess(`${report.dryRun ? 'Would fix' : 'Fixed'} permissions of ${file.path} (was ${was.join(', ')})`);
    }
  }

  if (unchanged > 0) {
    printInfo(`${plural(unchanged, 'file')} unchanged`);
  }
}

export function registerGenerateCommand(program: Command): void {
  withPillarOptions(
    program
      .command('generate')
      .alias('gen')
      .description('Generate salt-cloud providers, profiles and maps from the pillar')
  )
    .option('-c, --conf-dir <dir>', 'Salt configuration directory', DEFAULT_CONF_DIR)
    .option('--file-mode <mode>', 'Permissions of generated files', '0600')
    .option('--dir-mode <mode>', 'Permissions of generated directories', '0700')
    .option('-u, --user <user>', 'Owner of generated files (name or uid)')
    .option('-g, --group <group>', 'Group of generated files (name or gid)')
    .option('-n, --dry-run', 'Show what would change without writing')
    .option('--diff', 'Show a diff for updated files')
    .option('--json', 'Print the generated trees as JSON instead of writing files')
    .option('--strict', 'Fail without writing when any error diagnostic is reported')
    .action(withErrorHandler(async (options: GenerateOptions) => {
      const fileMode = parseMode(options.fileMode, '--file-mode');
      const dirMode = parseMode(options.dirMode, '--dir-mode');
      const owner = resolveOwnership(options.user, options.group);
      if (!owner.success) {
        throw owner.error;
      }
      const { providers, servers, defaults } = requireCloudInputs(options);

      if (options.json) {
        console.log(JSON.stringify(consumeMap(providers, servers, defaults), null, 2));
        return;
      }

      const spinner = ora('Expanding cloud map...').start();
      const config = consumeMap(providers, servers, defaults);
      const summary = summarizeConfig(config);
      spinner.succeed(
        `Expanded ${plural(summary.providers, 'provider')}, ${plural(summary.profiles, 'profile')}, ` +
        `${plural(summary.hosts, 'host')} across ${plural(summary.environments, 'environment')}`
      );

      if (config.diagnostics.length > 0) {
        printSection('Diagnostics');
        for (const diagnostic of config.diagnostics) {
          printDiagnostic(diagnostic);
        }
      }

      if (options.strict && hasErrors(config.diagnostics)) {
        throw new CLIError(
          `Generation reported ${plural(summary.errors, 'error')}, nothing was written`,
          ErrorCode.GENERATION_FAILED,
          'Fix the errors above or run without --strict'
        );
      }

      printSection(options.dryRun ? 'Planned changes' : 'Changes');
      const service = new PersistenceService({
        confDir: options.confDir,
        fileMode,
        dirMode,
        uid: owner.data.uid,
        gid: owner.data.gid,
        dryRun: options.dryRun,
      });

      const report = service.apply(config);
      if (!report.success) {
        throw report.error;
      }
      printReport(report.data, options.diff ?? false);

      printBlank();
      if (summary.warnings > 0 || summary.errors > 0) {
        printWarning(`Done with ${plural(summary.warnings, 'warning')} and ${plural(summary.errors, 'error')}`);
      } else {
        printSuccess('Done');
      }
    }));
}
