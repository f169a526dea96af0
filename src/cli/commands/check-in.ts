/**
 * Check-in Command
 *
 * Recognizes the faces of one image and records attendance for every
 * recognized identity.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { runWithSession } from '../utils/session-context.js';
import { readFaceDetections } from '../utils/face-input.js';
import { OutputFormat } from '../utils/output.js';
import { formatBox } from './recognize.js';
import { UNKNOWN_IDENTITY } from '../../models/face.js';

interface CheckInCommandOptions {
  image: string;
  source: string;
}

export function createCheckInCommand(): Command {
  return new Command('check-in')
    .description('Recognize faces in an image and record their attendance')
    .requiredOption('-i, --image <file>', 'Face document (*.faces.json)')
    .option('-s, --source <tag>', 'Source recorded with each event', 'camera')
    .action(async (options: CheckInCommandOptions, command: Command) => {
      await runWithSession(command, async ({ session, output }) => {
        const image = await readFaceDetections(options.image);
        const results = await session.checkIn({ image }, options.source);

        if (output.getFormat() === OutputFormat.JSON) {
          output.json({ type: 'check_in', results });
          return;
        }

        if (results.length === 0) {
          output.warning('No faces detected');
          return;
        }

        for (const result of results) {
          const where = chalk.dim(`[${formatBox(result.box)}] d=${result.distance.toFixed(4)}`);
          if (result.identity === UNKNOWN_IDENTITY) {
            console.log(`${chalk.yellow('?')} ${UNKNOWN_IDENTITY} ${where}`);
          } else if (result.logged) {
            console.log(`${chalk.green('✓')} ${chalk.bold(result.identity)} checked in ${where}`);
          } else {
            console.log(`${chalk.gray('•')} ${result.identity} already recorded ${where}`);
          }
        }
      });
    });
}
