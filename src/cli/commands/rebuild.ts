/**
 * Rebuild Command
 *
 * Re-derives the whole registry from the stored enrollment samples.
 */

import { Command } from 'commander';
import { runWithSession } from '../utils/session-context.js';

export function createRebuildCommand(): Command {
  return new Command('rebuild')
    .description('Rebuild the embedding registry from every stored sample')
    .action(async (_options: Record<string, unknown>, command: Command) => {
      await runWithSession(command, async ({ session, output }) => {
        const startTime = Date.now();
        const identities = await session.rebuild();

        output.success('Registry rebuilt', {
          identities,
          durationMs: Date.now() - startTime,
        });
      });
    });
}
