/**
 * List env command - Show environments, zones and subnets per provider
 */

import type { Command } from 'commander';
import { buildEnvironments } from '../../core';
import { withErrorHandler } from '../../utils/errors';
import { printSection, printDiagnostic, printError, colors, plural } from '../../utils/output';
import { requireCloudInputs, withPillarOptions, type PillarOptions } from '../pillar';
import type { CloudInputs, Environment } from '../../types';

interface ProviderEnvironments {
  provider: string;
  location?: string;
  environments: (Environment & { roles: number })[];
}

function getEnvironmentsInfo(inputs: CloudInputs): ProviderEnvironments[] {
  const result: ProviderEnvironments[] = [];

  for (const provider of Object.keys(inputs.providers).sort()) {
    const config = inputs.providers[provider];
    const built = buildEnvironments(provider, config.subnets);
    if (!built.success) {
      printDiagnostic(built.error);
      continue;
    }

    const assigned = inputs.servers[provider] ?? {};
    result.push({
      provider,
      location: config.location,
      environments: Object.values(built.data).map(env => ({
        ...env,
        roles: assigned[env.name]?.length ?? 0,
      })),
    });
  }

  return result;
}

export function registerListEnvCommand(parent: Command): void {
  withPillarOptions(
    parent
      .command('env')
      .alias('envs')
      .alias('environments')
      .description('List environments, availability zones and subnets per provider')
  )
    .option('--json', 'Output as JSON')
    .action(withErrorHandler(async (options: PillarOptions & { json?: boolean }) => {
      const providers = getEnvironmentsInfo(requireCloudInputs(options));

      if (options.json) {
        console.log(JSON.stringify({ providers }, null, 2));
        return;
      }

      printSection('Environments');
      console.log('');

      if (providers.length === 0) {
        printError('No providers found');
        console.log(colors.dim('Example pillar:'));
        console.log(colors.dim('  providers:'));
        console.log(colors.dim('    aws:'));
        console.log(colors.dim('      default_servers: 2'));
        console.log(colors.dim('      subnets:'));
        console.log(colors.dim('        test:'));
        console.log(colors.dim('          - { zone: a, subnet: subnet-1234 }'));
        return;
      }

      for (const { provider, location, environments } of providers) {
        const where = location ? colors.dim(` (${location})`) : '';
        console.log(colors.info(`● ${provider}`) + where);

        for (const env of environments) {
          console.log(`  ${colors.bold(env.name.padEnd(20))} ${colors.dim(`${plural(env.roles, 'role')}, ${plural(env.zones.length, 'zone')}`)}`);
          for (const zone of env.zones) {
            console.log(`    ${zone.padEnd(6)} ${env.subnets[zone]}`);
          }
        }
        console.log('');
      }
    }));
}
