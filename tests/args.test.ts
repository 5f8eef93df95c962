import { describe, expect, it } from 'vitest';

import { CliArgumentError, parseCliArgs } from '@/cli/args';

describe('parseCliArgs', () => {
  it('opens the interactive prompt when no value is given', () => {
    expect(parseCliArgs([])).toEqual({ help: false, debug: false, defaultChannel: null, mode: { kind: 'interactive' } });
  });

  it('parses a single value with a channel prefix', () => {
    const options = parseCliArgs(['3:0.25']);
    expect(options.mode).toEqual({ kind: 'single', command: { value: 0.25, channel: 3 } });
  });

  it('applies --channel to a bare value', () => {
    const options = parseCliArgs(['--channel', '4', '0.5', '--debug']);
    expect(options.debug).toBe(true);
    expect(options.defaultChannel).toBe(4);
    expect(options.mode).toEqual({ kind: 'single', command: { value: 0.5, channel: 4 } });
  });

  it('prefers watch mode over a positional value', () => {
    const options = parseCliArgs(['0.5', '--claudewatch', '30', '--channel', '2']);
    expect(options.mode).toEqual({ kind: 'watch', intervalSeconds: 30 });
    expect(options.defaultChannel).toBe(2);
  });

  it('recognises --help and -h', () => {
    expect(parseCliArgs(['--help']).help).toBe(true);
    expect(parseCliArgs(['-h']).help).toBe(true);
  });

  it('consumes both help flags when given together', () => {
    const options = parseCliArgs(['--help', '-h']);
    expect(options.help).toBe(true);
    expect(options.mode).toEqual({ kind: 'interactive' });
  });

  it.each([
    [['--channel'], '--channel requires a channel number (0-5)'],
    [['--channel', '6'], 'Invalid --channel value: 6'],
    [['--channel', 'two'], 'Invalid --channel value: two'],
    [['--channel', '-1'], 'Invalid --channel value: -1'],
    [['--claudewatch'], '--claudewatch requires an interval in seconds'],
    [['--claudewatch', '0'], 'Invalid --claudewatch interval: 0'],
    [['--claudewatch', '1.5'], 'Invalid --claudewatch interval: 1.5'],
    [['--claudewatch', 'often'], 'Invalid --claudewatch interval: often'],
    [['--verbose'], 'Unknown option: --verbose'],
    [['abc'], 'Invalid value: abc (use 0.5 or 2:0.5)'],
    [['1.2'], 'Value must be between 0.0 and 1.0'],
    [['9:0.5'], 'Channel must be an integer between 0 and 5'],
  ])('rejects %j', (argv, message) => {
    expect(() => parseCliArgs(argv)).toThrow(CliArgumentError);
    expect(() => parseCliArgs(argv)).toThrow(message);
  });
});
