/**
 * Attendance Command
 *
 * Lists recorded attendance, optionally filtered by identity and time.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { runWithSession } from '../utils/session-context.js';
import { parseDateBound } from '../utils/face-input.js';
import { OutputFormat, isOutputFormat, type Cell } from '../utils/output.js';
import type { AttendanceQuery, AttendanceRecord } from '../../models/attendance-record.js';
import { InputError } from '../../lib/errors/AttendanceErrors.js';

interface AttendanceCommandOptions {
  identity?: string;
  from?: string;
  to?: string;
  format: string;
}

export const ATTENDANCE_HEADERS = ['identity', 'timestamp', 'source', 'sessionKey'];

export function attendanceRow(record: AttendanceRecord): Cell[] {
  return [record.identity, record.timestamp, record.source, record.sessionKey];
}

export function buildAttendanceQuery(options: Omit<AttendanceCommandOptions, 'format'>): AttendanceQuery {
  return {
    identity: options.identity,
    from: options.from === undefined ? undefined : parseDateBound(options.from, 'from'),
    to: options.to === undefined ? undefined : parseDateBound(options.to, 'to'),
  };
}

export function createAttendanceCommand(): Command {
  return new Command('attendance')
    .description('List attendance records, oldest first')
    .option('--identity <name>', 'Only records of this identity')
    .option('--from <date>', 'Earliest timestamp (ISO 8601; a bare date starts at 00:00 UTC)')
    .option('--to <date>', 'Latest timestamp (ISO 8601; a bare date ends at 23:59:59.999 UTC)')
    .option('--format <type>', 'Output format (human|json|csv)', 'human')
    .action(async (options: AttendanceCommandOptions, command: Command) => {
      await runWithSession(command, async ({ session, output, globals }) => {
        if (!isOutputFormat(options.format)) {
          throw new InputError(`Unknown format "${options.format}" (expected human, json or csv)`);
        }
        if (!globals.json) {
          output.setFormat(options.format);
        }

        const records: AttendanceRecord[] = [];
        for await (const record of session.queryAttendance(buildAttendanceQuery(options))) {
          records.push(record);
        }

        if (output.getFormat() === OutputFormat.JSON) {
          output.json({ type: 'attendance', count: records.length, records });
          return;
        }

        if (output.getFormat() === OutputFormat.HUMAN && records.length === 0) {
          console.log(chalk.yellow('No attendance records found'));
          return;
        }

        output.table(ATTENDANCE_HEADERS, records.map(attendanceRow));
      });
    });
}
