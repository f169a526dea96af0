/**
 * Identities Command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { runWithSession } from '../utils/session-context.js';
import { OutputFormat } from '../utils/output.js';

export function createIdentitiesCommand(): Command {
  return new Command('identities')
    .description('List enrolled identities with their stored sample counts')
    .action(async (_options: Record<string, unknown>, command: Command) => {
      await runWithSession(command, async ({ session, output }) => {
        const identities = await session.listIdentities();

        if (output.getFormat() === OutputFormat.JSON) {
          output.json({ type: 'identities', identities });
          return;
        }

        if (identities.length === 0) {
          console.log(chalk.yellow('No identities enrolled'));
          return;
        }

        output.table(
          ['identity', 'samples'],
          identities.map(({ identity, sampleCount }) => [identity, sampleCount])
        );
      });
    });
}
