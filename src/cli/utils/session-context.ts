/**
 * Shared command plumbing: global flags, configuration, and one session per
 * command invocation
 */

import { Command } from 'commander';
import { join } from 'path';
import { loadConfig, type AppConfig } from '../../lib/env-config.js';
import { logger } from '../../lib/logger.js';
import { openAttendanceSession, type OpenedSession } from '../../services/session-factory.js';
import type { AttendanceSession } from '../../services/attendance-session.js';
import type { FaceDetections } from '../../models/face.js';
import { OutputFormat, OutputFormatter } from './output.js';

export interface GlobalOptions {
  json: boolean;
  verbose: boolean;
  quiet: boolean;
}

export function readGlobalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals();
  return {
    json: opts.json === true,
    verbose: opts.verbose === true,
    quiet: opts.quiet === true,
  };
}

export interface CommandContext {
  session: AttendanceSession<FaceDetections>;
  storageStats: OpenedSession['storageStats'];
  output: OutputFormatter;
  config: AppConfig;
  globals: GlobalOptions;
}

/**
 * Open a session for `command`, run `fn`, and close the session again
 *
 * Errors are printed through the formatter and end the process with exit
 * code 1.
 */
export async function runWithSession(
  command: Command,
  fn: (context: CommandContext) => Promise<void>
): Promise<void> {
  const globals = readGlobalOptions(command);
  const output = new OutputFormatter(globals.json ? OutputFormat.JSON : OutputFormat.HUMAN, {
    quiet: globals.quiet,
  });

  const configResult = loadConfig();
  if (configResult.isErr()) {
    output.error('Configuration error', configResult.error);
    process.exit(1);
  }
  const config = configResult.value;

  logger.configure({
    logDir: config.storage === 'memory' ? undefined : join(config.home, 'logs'),
    consoleLevel: globals.verbose ? 'debug' : globals.quiet ? 'error' : config.logLevel,
  });

  let opened: OpenedSession;
  try {
    opened = openAttendanceSession(config, { logger });
  } catch (error) {
    output.error('Failed to open attendance data', error);
    process.exit(1);
  }

  try {
    await fn({ session: opened.session, storageStats: opened.storageStats, output, config, globals });
  } catch (error) {
    opened.close();
    output.error(`${command.name()} failed`, error);
    process.exit(1);
  }

  opened.close();
}
