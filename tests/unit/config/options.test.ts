import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { mergeOptions, parseConcurrency, collect } from '../../../src/config/options.js';
import type { SnapshotCliOptions, OptionSource } from '../../../src/config/options.js';

const defaults: SnapshotCliOptions = {
  exclude: [],
  gitGlobal: true,
  gitExclude: true,
  parents: true,
};

/** Commander reports 'cli' only for flags given on the command line. */
function sources(...fromCli: string[]): OptionSource {
  return name => (fromCli.includes(name) ? 'cli' : 'default');
}

describe('parseConcurrency', () => {
  it('accepts positive integers', () => {
    expect(parseConcurrency('8')).toBe(8);
  });

  it.each(['0', '-1', '2.5', 'many'])('rejects %s', value => {
    expect(() => parseConcurrency(value)).toThrow(InvalidArgumentError);
  });
});

describe('collect', () => {
  it('appends repeated values', () => {
    expect(collect('b', collect('a', []))).toEqual(['a', 'b']);
  });
});

describe('mergeOptions', () => {
  it('uses CLI defaults when there is no config', () => {
    expect(mergeOptions(defaults, {}, sources())).toEqual({
      output: undefined,
      verbose: false,
      snapshot: {
        overrides: [],
        gitGlobal: true,
        gitExclude: true,
        parents: true,
        concurrency: undefined,
        followSymlinks: false,
        verbose: false,
      },
    });
  });

  it('lets the config fill in flags left at their defaults', () => {
    const run = mergeOptions(
      defaults,
      { output: '/cfg/out.md', exclude: ['*.lock'], parents: false, concurrency: 3, followSymlinks: true, verbose: true },
      sources()
    );

    expect(run.output).toBe('/cfg/out.md');
    expect(run.verbose).toBe(true);
    expect(run.snapshot).toMatchObject({
      overrides: ['*.lock'],
      parents: false,
      concurrency: 3,
      followSymlinks: true,
      verbose: true,
    });
  });

  it('prints to stdout with --text even when the config names an output', () => {
    const run = mergeOptions({ ...defaults, text: true }, { output: '/cfg/out.md' }, sources('text'));
    expect(run.output).toBeUndefined();
  });

  it('keeps an explicit --out over --text', () => {
    const run = mergeOptions({ ...defaults, text: true, out: 'cli.md' }, { output: '/cfg/out.md' }, sources('text', 'out'));
    expect(run.output).toBe('cli.md');
  });

  it('lets explicit flags beat the config', () => {
    const cli: SnapshotCliOptions = { ...defaults, out: 'cli.md', exclude: ['tmp/'], gitGlobal: false, concurrency: 2 };
    const run = mergeOptions(
      cli,
      { output: '/cfg/out.md', exclude: ['*.lock'], gitGlobal: true, concurrency: 6 },
      sources('out', 'exclude', 'gitGlobal', 'concurrency')
    );

    expect(run.output).toBe('cli.md');
    expect(run.snapshot.overrides).toEqual(['tmp/']);
    expect(run.snapshot.gitGlobal).toBe(false);
    expect(run.snapshot.concurrency).toBe(2);
  });
});
