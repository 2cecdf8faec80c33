import { describe, it, expect } from 'vitest';
import { parseArgs, usage } from '../src/cli.js';
import { UsageError } from '../src/errors.js';

describe('parseArgs', () => {
  it('takes a command and a file', () => {
    expect(parseArgs(['update', 'list.csv'])).toEqual({ help: false, cmd: 'update', file: 'list.csv' });
    expect(parseArgs(['purge', 'backup.csv'])).toEqual({ help: false, cmd: 'purge', file: 'backup.csv' });
  });

  it('takes a time range for retrieve', () => {
    expect(parseArgs(['retrieve', 'out.csv', '2023-01-01T00:00', '2023-01-02T00:00'])).toEqual({
      help: false,
      cmd: 'retrieve',
      file: 'out.csv',
      fromTime: '2023-01-01T00:00',
      toTime: '2023-01-02T00:00'
    });
  });

  it('asks for help', () => {
    expect(parseArgs(['-h'])).toEqual({ help: true });
    expect(parseArgs(['check', 'x.csv', '--help'])).toEqual({ help: true });
  });

  it('rejects bad invocations', () => {
    expect(() => parseArgs([])).toThrow(new UsageError('Missing arguments.'));
    expect(() => parseArgs(['check'])).toThrow('Missing arguments.');
    expect(() => parseArgs(['upload', 'x.csv'])).toThrow('Unknown command: upload');
    expect(() => parseArgs(['update', 'x.csv', '2023-01-01T00:00'])).toThrow('from_time and to_time apply to retrieve only');
    expect(() => parseArgs(['retrieve', 'x.csv', '2023-01-01T00:00'])).toThrow('to_time is required with from_time');
    expect(() => parseArgs(['retrieve', 'x.csv', 'a', 'b', 'c'])).toThrow('Unexpected argument: c');
  });
});

describe('usage', () => {
  it('lists every command', () => {
    const text = usage('suppress');
    expect(text).toContain('   suppress cmd supp_list [from_time to_time]');
    expect(text).toContain('    cmd                  check|retrieve|update|delete|purge');
  });
});
