/**
 * Enroll Command
 *
 * Registers or replaces the face vector of one identity.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { runWithSession } from '../utils/session-context.js';
import { readFaceInput, type FaceInputOptions } from '../utils/face-input.js';
import { OutputFormat } from '../utils/output.js';

export function createEnrollCommand(): Command {
  return new Command('enroll')
    .description('Enroll an identity from a face document or a precomputed vector')
    .argument('<identity>', 'Name of the person to enroll')
    .option('-i, --image <file>', 'Face document (*.faces.json); the sample is kept for rebuilds')
    .option('--vector <values>', 'Comma-separated embedding vector')
    .action(async (identity: string, options: FaceInputOptions, command: Command) => {
      await runWithSession(command, async ({ session, output }) => {
        const input = await readFaceInput(options);
        const result = await session.enroll(identity, input);

        if (output.getFormat() === OutputFormat.JSON) {
          output.success('Identity enrolled', { ...result });
          return;
        }

        output.success(`Enrolled ${chalk.bold(result.identity)}`, {
          registryVersion: result.version,
          ...(result.sampleRef ? { sample: result.sampleRef } : {}),
        });
      });
    });
}
