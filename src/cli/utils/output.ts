/**
 * Output formatting utilities for CLI
 */

import chalk from 'chalk';
import { FaceAttendanceError } from '../../lib/errors/AttendanceErrors.js';

/**
 * Output format types
 */
export enum OutputFormat {
  HUMAN = 'human',
  JSON = 'json',
  CSV = 'csv'
}

const OUTPUT_FORMATS: readonly string[] = [OutputFormat.HUMAN, OutputFormat.JSON, OutputFormat.CSV];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.includes(value);
}

/**
 * Symbols for terminal output
 */
const symbols = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  info: 'ℹ',
  bullet: '•'
};

export type Cell = string | number | boolean | null | undefined;

/**
 * Render rows as RFC 4180 CSV; fields with commas, quotes or line breaks
 * are quoted
 */
export function toCsv(headers: string[], rows: Cell[][]): string {
  return [headers, ...rows].map(row => row.map(csvField).join(',')).join('\n');
}

function csvField(cell: Cell): string {
  const text = cell === null || cell === undefined ? '' : String(cell);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Output formatter class
 */
export class OutputFormatter {
  private format: OutputFormat;
  private quiet: boolean;

  constructor(format: OutputFormat = OutputFormat.HUMAN, options: { quiet?: boolean } = {}) {
    this.format = format;
    this.quiet = options.quiet ?? false;
  }

  /**
   * Outputs success message
   */
  success(message: string, data?: Record<string, unknown>): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'success', message, ...data });
    } else if (!this.quiet) {
      console.log(`${chalk.green(symbols.success)} ${message}`);
      if (data) {
        this.details(data);
      }
    }
  }

  /**
   * Outputs error message
   */
  error(message: string, error?: unknown): void {
    if (this.format === OutputFormat.JSON) {
      this.json({
        status: 'error',
        message,
        error: error instanceof Error ? {
          name: error.name,
          code: error instanceof FaceAttendanceError ? error.code : undefined,
          message: error.message
        } : undefined
      });
    } else {
      console.error(`${chalk.red(symbols.error)} ${chalk.red(message)}`);
      if (error instanceof Error && error.message && error.message !== message) {
        console.error(`  ${chalk.dim(error.message)}`);
      }
    }
  }

  /**
   * Outputs warning message
   */
  warning(message: string, details?: Record<string, unknown>): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'warning', message, ...details });
    } else {
      console.warn(`${chalk.yellow(symbols.warning)} ${chalk.yellow(message)}`);
      if (details) {
        this.details(details);
      }
    }
  }

  /**
   * Outputs info message
   */
  info(message: string, details?: Record<string, unknown>): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'info', message, ...details });
    } else if (!this.quiet) {
      console.log(`${chalk.blue(symbols.info)} ${message}`);
      if (details) {
        this.details(details);
      }
    }
  }

  /**
   * Outputs a table
   */
  table(headers: string[], rows: Cell[][]): void {
    if (this.format === OutputFormat.JSON) {
      const data = rows.map(row =>
        Object.fromEntries(headers.map((header, i) => [header, row[i] ?? null]))
      );
      this.json({ type: 'table', headers, data });
      return;
    }

    if (this.format === OutputFormat.CSV) {
      console.log(toCsv(headers, rows));
      return;
    }

    // Calculate column widths
    const widths = headers.map((h, i) => {
      const values = [h, ...rows.map(r => String(r[i] ?? ''))];
      return Math.max(...values.map(v => v.length));
    });

    const headerRow = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join(' │ ');
    console.log(chalk.bold(headerRow));

    const separator = widths.map(w => '─'.repeat(w)).join('─┼─');
    console.log(chalk.dim(separator));

    for (const row of rows) {
      const rowStr = row.map((cell, i) =>
        String(cell ?? '').padEnd(widths[i] ?? 0)
      ).join(' │ ');
      console.log(rowStr);
    }
  }

  /**
   * Outputs a list
   */
  list(items: string[]): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ type: 'list', items });
    } else {
      for (const item of items) {
        console.log(`  ${chalk.dim(symbols.bullet)} ${item}`);
      }
    }
  }

  /**
   * Outputs raw JSON
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * Outputs details (key-value pairs)
   */
  private details(data: Record<string, unknown>): void {
    for (const [key, value] of Object.entries(data)) {
      const formattedKey = key
        .replace(/([a-z])([A-Z])/g, '$1 $2')
        .replace(/\b\w/g, l => l.toUpperCase());
      console.log(`  ${chalk.dim(formattedKey + ':')} ${typeof value === 'object' ? JSON.stringify(value) : String(value)}`);
    }
  }

  /**
   * Sets output format
   */
  setFormat(format: OutputFormat): void {
    this.format = format;
  }

  /**
   * Gets output format
   */
  getFormat(): OutputFormat {
    return this.format;
  }
}
