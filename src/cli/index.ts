#!/usr/bin/env node

import { Command } from 'commander';
import { createEnrollCommand } from './commands/enroll.js';
import { createRecognizeCommand } from './commands/recognize.js';
import { createCheckInCommand } from './commands/check-in.js';
import { createLogCommand } from './commands/log.js';
import { createAttendanceCommand } from './commands/attendance.js';
import { createIdentitiesCommand } from './commands/identities.js';
import { createRebuildCommand } from './commands/rebuild.js';
import { createRemoveCommand } from './commands/remove.js';
import { createStatusCommand } from './commands/status.js';
import { OutputFormatter } from './utils/output.js';

const program = new Command();
const output = new OutputFormatter();

program
  .name('face-attendance')
  .description('Face-recognition attendance: enroll identities, recognize faces, record attendance')
  .version('1.0.0')
  .option('--json', 'Output results in JSON format')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('-q, --quiet', 'Suppress non-error output');

process.on('SIGINT', () => {
  console.log('\nOperation cancelled.');
  process.exit(130);
});

process.on('SIGTERM', () => {
  process.exit(143);
});

// Register commands
program.addCommand(createEnrollCommand());
program.addCommand(createRecognizeCommand());
program.addCommand(createCheckInCommand());
program.addCommand(createLogCommand());
program.addCommand(createAttendanceCommand());
program.addCommand(createIdentitiesCommand());
program.addCommand(createRebuildCommand());
program.addCommand(createRemoveCommand());
program.addCommand(createStatusCommand());

program.parseAsync(process.argv).catch((error: unknown) => {
  output.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});

export { program };
