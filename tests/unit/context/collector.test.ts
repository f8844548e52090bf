import { describe, it, expect } from 'vitest';
import { PathChannel, comparePaths, compareNames, ChannelClosedError } from '../../../src/context/index.js';

describe('compareNames', () => {
  it('orders by UTF-16 code unit, not locale', () => {
    expect(['a', '_', 'B', 'b'].sort(compareNames)).toEqual(['B', '_', 'a', 'b']);
  });
});

describe('comparePaths', () => {
  it('compares component by component', () => {
    expect(['/r/src-old/x.ts', '/r/src/main.ts'].sort(comparePaths)).toEqual(['/r/src/main.ts', '/r/src-old/x.ts']);
  });

  it('puts a directory prefix before its longer siblings', () => {
    expect(['/r/a.b', '/r/a/b', '/r/a'].sort(comparePaths)).toEqual(['/r/a', '/r/a/b', '/r/a.b']);
  });

  it('treats equal strings as equal', () => {
    expect(comparePaths('src/x', 'src/x')).toBe(0);
  });
});

describe('PathChannel', () => {
  it('returns emitted paths sorted and deduplicated', async () => {
    const channel = new PathChannel();
    channel.emit('/r/src/b.ts');
    channel.emit('/r/a.ts');
    channel.emit('/r/src/b.ts');
    channel.close();

    expect(await channel.collect()).toEqual(['/r/a.ts', '/r/src/b.ts']);
  });

  it('waits for close before collecting', async () => {
    const channel = new PathChannel();
    const pending = channel.collect();

    channel.emit('/r/late.ts');
    channel.emit('/r/early.ts');
    channel.close();

    expect(await pending).toEqual(['/r/early.ts', '/r/late.ts']);
  });

  it('rejects emits after close', () => {
    const channel = new PathChannel();
    channel.close();

    expect(() => channel.emit('/r/x')).toThrow(ChannelClosedError);
    expect(() => channel.emit('/r/x')).toThrow('Path channel is closed; cannot emit /r/x');
  });

  it('close is idempotent', async () => {
    const channel = new PathChannel();
    channel.emit('/r/x');
    channel.close();
    channel.close();

    expect(channel.isClosed).toBe(true);
    expect(await channel.collect()).toEqual(['/r/x']);
  });

  it('collects an empty list when nothing was emitted', async () => {
    const channel = new PathChannel();
    channel.close();
    expect(await channel.collect()).toEqual([]);
  });
});
