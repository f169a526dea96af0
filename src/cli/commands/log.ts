/**
 * Log Command
 *
 * Records attendance for a named identity, without recognition.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { runWithSession } from '../utils/session-context.js';
import { OutputFormat } from '../utils/output.js';

interface LogCommandOptions {
  source: string;
}

export function createLogCommand(): Command {
  return new Command('log')
    .description('Record attendance for an identity')
    .argument('<identity>', 'Identity to record')
    .option('-s, --source <tag>', 'Source recorded with the event', 'manual')
    .action(async (identity: string, options: LogCommandOptions, command: Command) => {
      await runWithSession(command, async ({ session, output }) => {
        const outcome = await session.logAttendance(identity, options.source);

        if (output.getFormat() === OutputFormat.JSON) {
          output.json(outcome);
          return;
        }

        if (outcome.logged) {
          output.success(`Attendance recorded for ${chalk.bold(outcome.record.identity)}`, {
            timestamp: outcome.record.timestamp,
            session: outcome.record.sessionKey,
          });
        } else {
          output.info(`${outcome.identity} is already recorded for this session`, {
            session: outcome.sessionKey,
          });
        }
      });
    });
}
