/**
 * List hosts command - Show the hostnames each profile receives
 */

import type { Command } from 'commander';
import { consumeMap } from '../../core';
import { CLIError, ErrorCode, withErrorHandler } from '../../utils/errors';
import { printSection, printDiagnostic, colors, plural } from '../../utils/output';
import { requireCloudInputs, withPillarOptions, type PillarOptions } from '../pillar';

export function registerListHostsCommand(parent: Command): void {
  withPillarOptions(
    parent
      .command('hosts <env>')
      .description('List generated hostnames per profile for an environment')
  )
    .option('--json', 'Output as JSON')
    .action(withErrorHandler(async (env: string, options: PillarOptions & { json?: boolean }) => {
      const { providers, servers, defaults } = requireCloudInputs(options);
      const config = consumeMap(providers, servers, defaults);
      const map = config.maps[env];

      if (!map) {
        const known = Object.keys(config.maps).sort();
        throw new CLIError(
          `No hosts generated for environment "${env}"`,
          ErrorCode.ENV_NOT_FOUND,
          known.length > 0 ? `Known environments: ${known.join(', ')}` : 'Check the servers tree of the pillar'
        );
      }

      if (options.json) {
        console.log(JSON.stringify({ environment: env, profiles: map }, null, 2));
        return;
      }

      for (const diagnostic of config.diagnostics.filter(d => d.environment === env)) {
        printDiagnostic(diagnostic);
      }

      printSection(`Hosts: ${env}`);
      console.log('');

      for (const profile of Object.keys(map).sort()) {
        const hostnames = Object.keys(map[profile]);
        console.log(`${colors.info(profile)} ${colors.dim(`(${plural(hostnames.length, 'host')})`)}`);
        for (const hostname of hostnames) {
          console.log(`  ${hostname}`);
        }
        console.log('');
      }
    }));
}
