/**
 * Recognize Command
 *
 * Identifies the faces of one image without recording attendance.
 */

import { Command } from 'commander';
import { runWithSession } from '../utils/session-context.js';
import { readFaceInput, type FaceInputOptions } from '../utils/face-input.js';
import { OutputFormat, type Cell } from '../utils/output.js';
import type { BoundingBox } from '../../models/face.js';

export function formatBox(box: BoundingBox | undefined): string {
  return box ? `${box.top},${box.right},${box.bottom},${box.left}` : '-';
}

export function createRecognizeCommand(): Command {
  return new Command('recognize')
    .description('Identify faces against the enrolled registry')
    .option('-i, --image <file>', 'Face document (*.faces.json)')
    .option('--vector <values>', 'Comma-separated embedding vector')
    .action(async (options: FaceInputOptions, command: Command) => {
      await runWithSession(command, async ({ session, output }) => {
        const input = await readFaceInput(options);
        const results = await session.recognize(input);

        if (output.getFormat() === OutputFormat.JSON) {
          output.json({ type: 'matches', results });
          return;
        }

        if (results.length === 0) {
          output.warning('No faces detected');
          return;
        }

        const rows: Cell[][] = results.map(result => [
          result.identity,
          result.distance.toFixed(4),
          formatBox(result.box),
        ]);
        output.table(['identity', 'distance', 'box (t,r,b,l)'], rows);
      });
    });
}
