/**
 * Validate command - Check the pillar trees and dry-run the expansion
 */

import type { Command } from 'commander';
import { consumeMap, hasErrors } from '../core';
import { groupIssues, printValidationReport, validateCloudInputs } from '../schemas';
import { loadCloudInputs } from '../utils/config';
import { ValidationError, withErrorHandler } from '../utils/errors';
import { printDiagnostic, printSection, printSuccess } from '../utils/output';
import { withPillarOptions, type PillarOptions } from './pillar';

interface ValidateOptions extends PillarOptions {
  json?: boolean;
}

export function registerValidateCommand(program: Command): void {
  withPillarOptions(
    program
      .command('validate')
      .description('Validate the pillar trees and report expansion diagnostics')
  )
    .option('--json', 'Output as JSON')
    .action(withErrorHandler(async (options: ValidateOptions) => {
      const raw = loadCloudInputs({
        pillar: options.pillar,
        keys: {
          providers: options.providersKey,
          servers: options.serversKey,
          defaults: options.defaultsKey,
        },
      });
      if (!raw.success) {
        throw raw.error;
      }

      const inputs = validateCloudInputs(raw.data);
      const issues = inputs.success ? [] : inputs.error;
      const diagnostics = inputs.success
        ? consumeMap(inputs.data.providers, inputs.data.servers, inputs.data.defaults).diagnostics
        : [];

      if (options.json) {
        console.log(JSON.stringify({ valid: issues.length === 0 && !hasErrors(diagnostics), issues, diagnostics }, null, 2));
      } else {
        printValidationReport(groupIssues(issues));

        if (inputs.success) {
          printSection('Expansion');
          if (diagnostics.length === 0) {
            printSuccess('No diagnostics');
          }
          for (const diagnostic of diagnostics) {
            printDiagnostic(diagnostic);
          }
          console.log('');
        }
      }

      if (issues.length > 0 || hasErrors(diagnostics)) {
        throw new ValidationError('Pillar is not valid');
      }
    }));
}
