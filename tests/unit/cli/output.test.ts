import { describe, it, expect, vi, afterEach } from 'vitest';
import { OutputFormat, OutputFormatter, isOutputFormat, toCsv } from '../../../src/cli/utils/output.js';
import { ATTENDANCE_HEADERS, attendanceRow, buildAttendanceQuery } from '../../../src/cli/commands/attendance.js';
import { InputError } from '../../../src/lib/errors/AttendanceErrors.js';

describe('CLI output', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('toCsv', () => {
    it('should render a header and rows', () => {
      expect(toCsv(['a', 'b'], [[1, 'x'], [2, null]])).toBe('a,b\n1,x\n2,');
    });

    it('should quote fields with commas, quotes and line breaks', () => {
      expect(toCsv(['name'], [['Ng, Jo'], ['say "hi"'], ['two\nlines']])).toBe(
        'name\n"Ng, Jo"\n"say ""hi"""\n"two\nlines"'
      );
    });
  });

  it('should print attendance records as CSV', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const output = new OutputFormatter(OutputFormat.CSV);

    output.table(ATTENDANCE_HEADERS, [
      attendanceRow({ identity: 'alice', timestamp: '2026-03-02T09:00:00.000Z', source: 'camera', sessionKey: '20260302' }),
    ]);

    expect(log).toHaveBeenCalledWith(
      'identity,timestamp,source,sessionKey\nalice,2026-03-02T09:00:00.000Z,camera,20260302'
    );
  });

  it('should print tables as JSON objects', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const output = new OutputFormatter(OutputFormat.JSON);

    output.table(['identity', 'samples'], [['alice', 2]]);

    expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toEqual({
      type: 'table',
      headers: ['identity', 'samples'],
      data: [{ identity: 'alice', samples: 2 }],
    });
  });

  it('should include the error code in JSON errors', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const output = new OutputFormatter(OutputFormat.JSON);

    output.error('enroll failed', new InputError('bad input'));

    expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toEqual({
      status: 'error',
      message: 'enroll failed',
      error: { name: 'InputError', code: 'INPUT_ERROR', message: 'bad input' },
    });
  });

  it('should suppress success messages when quiet', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new OutputFormatter(OutputFormat.HUMAN, { quiet: true }).success('done');

    expect(log).not.toHaveBeenCalled();
  });

  it('should recognize output formats', () => {
    expect(isOutputFormat('csv')).toBe(true);
    expect(isOutputFormat('xml')).toBe(false);
  });

  it('should turn command options into an attendance query', () => {
    expect(buildAttendanceQuery({ identity: 'alice', from: '2026-03-01', to: '2026-03-02' })).toEqual({
      identity: 'alice',
      from: new Date('2026-03-01T00:00:00.000Z'),
      to: new Date('2026-03-02T23:59:59.999Z'),
    });
  });
});
