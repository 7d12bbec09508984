import { describe, expect, it } from 'vitest';
import { parseCliArgs } from './cli.js';
import { ConfigError } from './utils/errors.js';

describe('parseCliArgs', () => {
  it('defaults to service mode', () => {
    expect(parseCliArgs([])).toEqual({ kind: 'service' });
    expect(parseCliArgs(['--service'])).toEqual({ kind: 'service' });
  });

  it('parses a one-off run', () => {
    expect(parseCliArgs(['--run'])).toEqual({ kind: 'run', force: false });
    expect(parseCliArgs(['--run', '--date=2024-06-01', '--force'])).toEqual({
      kind: 'run',
      targetDate: '2024-06-01',
      force: true,
    });
  });

  it('validates the date option', () => {
    expect(() => parseCliArgs(['--run', '--date=2024-13-01'])).toThrow(ConfigError);
  });

  it('parses status with a day count', () => {
    expect(parseCliArgs(['--status'])).toEqual({ kind: 'status', days: 7 });
    expect(parseCliArgs(['--status', '--days=3'])).toEqual({ kind: 'status', days: 3 });
    expect(() => parseCliArgs(['--status', '--days=0'])).toThrow('--days must be a positive integer, got "0"');
  });

  it('parses paper queries', () => {
    expect(parseCliArgs(['--papers'])).toEqual({ kind: 'papers' });
    expect(parseCliArgs(['--papers', '--date=2024-06-03', '--keyword=diffusion'])).toEqual({
      kind: 'papers',
      date: '2024-06-03',
      keyword: 'diffusion',
    });
  });

  it('parses the config dump', () => {
    expect(parseCliArgs(['--config'])).toEqual({ kind: 'config' });
  });

  it('rejects more than one command', () => {
    expect(() => parseCliArgs(['--run', '--status'])).toThrow(
      'Only one of --run, --service, --status, --papers, --config may be given'
    );
  });
});
