/**
 * Status Command
 *
 * Health overview of the registry, matcher and dedup policy.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { runWithSession } from '../utils/session-context.js';
import { OutputFormat } from '../utils/output.js';
import { EmbeddingsUnavailableError } from '../../lib/errors/AttendanceErrors.js';

export function createStatusCommand(): Command {
  return new Command('status')
    .description('Show registry and matcher status')
    .action(async (_options: Record<string, unknown>, command: Command) => {
      await runWithSession(command, async ({ session, storageStats, output, config }) => {
        let available = true;
        try {
          await session.refresh();
        } catch (error) {
          if (!(error instanceof EmbeddingsUnavailableError)) {
            throw error;
          }
          available = false;
        }

        const status = await session.status();
        const database = storageStats();

        if (output.getFormat() === OutputFormat.JSON) {
          output.json({ type: 'status', storage: config.storage, home: config.home, ...status, database });
          return;
        }

        console.log(chalk.bold('\nFace attendance status\n'));
        if (available) {
          console.log(chalk.green('✓') + ` Registry version ${status.snapshotVersion}`);
        } else {
          console.log(chalk.yellow('⚠') + ' No registry built yet');
          console.log(chalk.dim('  Run "face-attendance enroll" or "face-attendance rebuild"'));
        }
        console.log(chalk.dim(`  Identities: ${status.knownIdentities}`));
        console.log(chalk.dim(`  Match: ${status.metric} distance <= ${status.threshold}`));
        console.log(chalk.dim(`  Dedup: ${status.dedupPolicy}`));
        console.log(chalk.dim(`  Storage: ${config.storage} (${config.home})`));
        if (database) {
          console.log(chalk.dim(`  Stored entries: ${database.entryCount}`));
          console.log(chalk.dim(`  Schema version: ${database.schemaVersion}`));
        }
        console.log();
      });
    });
}
