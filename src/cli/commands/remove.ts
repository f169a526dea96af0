/**
 * Remove Command
 *
 * Deletes an enrolled identity and its stored samples.
 */

import { Command } from 'commander';
import { runWithSession } from '../utils/session-context.js';

export function createRemoveCommand(): Command {
  return new Command('remove')
    .description('Remove an enrolled identity and its stored samples')
    .argument('<identity>', 'Identity to remove')
    .action(async (identity: string, _options: Record<string, unknown>, command: Command) => {
      await runWithSession(command, async ({ session, output }) => {
        const removedSamples = await session.remove(identity);

        output.success(`Removed ${identity.trim()}`, { removedSamples });
      });
    });
}
