import { describe, it, expect, afterEach } from 'vitest';
import { join } from 'path';
import {
  assembleSnapshot,
  assembleSnapshotParts,
  formatFileBlock,
  languageTag,
  readFileContent,
  readFileContents,
  SNAPSHOT_SUMMARY,
} from '../../../src/context/index.js';
import { createFixture, writeFiles, removeFixture } from '../fixture.js';

const fixtures: string[] = [];

function project(files: Record<string, string | Uint8Array>): string {
  const root = createFixture('snapshot');
  fixtures.push(root);
  writeFiles(root, files);
  return root;
}

afterEach(() => {
  for (const root of fixtures.splice(0)) removeFixture(root);
});

// ─── Language tags ──────────────────────────────────────────────────────────

describe('languageTag', () => {
  it('uses the last extension', () => {
    expect(languageTag('src/main.rs')).toBe('rs');
    expect(languageTag('archive.tar.gz')).toBe('gz');
  });

  it('is empty for names without an extension', () => {
    expect(languageTag('Makefile')).toBe('');
    expect(languageTag('.gitignore')).toBe('');
    expect(languageTag('dir.d/LICENSE')).toBe('');
  });
});

// ─── File blocks ────────────────────────────────────────────────────────────

describe('formatFileBlock', () => {
  const base = { relativePath: 'src/a.ts', absolutePath: '/r/src/a.ts', language: 'ts' };

  it('wraps content in a fence annotated with extension and path', () => {
    const block = formatFileBlock({ ...base, status: 'ok', content: 'const a = 1;', size: 12 });
    expect(block).toBe('```ts:src/a.ts\nconst a = 1;\n```\n\n');
  });

  it('keeps content verbatim, trailing newline included', () => {
    const block = formatFileBlock({ ...base, status: 'ok', content: 'x\n', size: 2 });
    expect(block).toBe('```ts:src/a.ts\nx\n\n```\n\n');
  });

  it('shows the read error in place of content', () => {
    const block = formatFileBlock({ ...base, status: 'read-error', error: 'EACCES: permission denied' });
    expect(block).toBe('```ts:src/a.ts\nError reading file: EACCES: permission denied\n```\n\n');
  });
});

// ─── Reading ────────────────────────────────────────────────────────────────

describe('readFileContent', () => {
  it('reads UTF-8 text with its size', async () => {
    const root = project({ 'notes/é.md': 'héllo' });
    const file = await readFileContent(root, join(root, 'notes', 'é.md'));

    expect(file).toEqual({
      status: 'ok',
      content: 'héllo',
      size: 6,
      relativePath: 'notes/é.md',
      absolutePath: join(root, 'notes', 'é.md'),
      language: 'md',
    });
  });

  it('keeps a byte order mark', async () => {
    const root = project({ 'bom.txt': '\uFEFFtext' });
    const file = await readFileContent(root, join(root, 'bom.txt'));
    expect(file.status === 'ok' && file.content).toBe('\uFEFFtext');
  });

  it('reports invalid UTF-8 as a read error', async () => {
    const root = project({ 'blob.bin': new Uint8Array([0xff, 0xfe, 0x00, 0xc3]) });
    const file = await readFileContent(root, join(root, 'blob.bin'));
    expect(file.status).toBe('read-error');
  });

  it('reports a missing file as a read error', async () => {
    const root = project({});
    const file = await readFileContent(root, join(root, 'gone.ts'));

    expect(file.status).toBe('read-error');
    expect(file.status === 'read-error' && file.error).toContain('ENOENT');
  });
});

describe('readFileContents', () => {
  it('returns results in list order regardless of concurrency', async () => {
    const files: Record<string, string> = {};
    for (let i = 0; i < 20; i++) files[`f${String(i).padStart(2, '0')}.txt`] = `content ${i}`;
    const root = project(files);
    const paths = Object.keys(files).map(name => join(root, name));

    const results = await readFileContents(root, paths, { concurrency: 7 });

    expect(results.map(r => r.relativePath)).toEqual(Object.keys(files));
    expect(results.map(r => (r.status === 'ok' ? r.content : ''))).toEqual(Object.values(files));
  });
});

// ─── Assembly ───────────────────────────────────────────────────────────────

describe('assembleSnapshot', () => {
  it('renders the full document', async () => {
    const root = project({ 'b.txt': 'B', 'a/x.md': '# X' });
    const paths = [join(root, 'a', 'x.md'), join(root, 'b.txt')];

    const document = await assembleSnapshot('demo', root, paths);

    expect(document).toBe(
      '# Project Snapshot: demo\n\n' +
        `${SNAPSHOT_SUMMARY}\n` +
        'Total files included: 2\n\n' +
        '```\n.\n├── a\n│   └── x.md\n└── b.txt\n\n```\n\n' +
        '## File Contents\n\n' +
        '```md:a/x.md\n# X\n```\n\n' +
        '```txt:b.txt\nB\n```\n\n'
    );
  });

  it('keeps a block for a file that vanished after listing', async () => {
    const root = project({ 'kept.ts': 'ok' });
    const paths = [join(root, 'deleted.ts'), join(root, 'kept.ts')];

    const { files, document } = await assembleSnapshotParts('demo', root, paths);

    expect(files.map(f => f.status)).toEqual(['read-error', 'ok']);
    expect(document).toContain('Total files included: 2\n');
    expect(document).toContain('```ts:deleted.ts\nError reading file: ENOENT');
    expect(document.endsWith('```ts:kept.ts\nok\n```\n\n')).toBe(true);
  });

  it('is byte-identical across runs', async () => {
    const root = project({ 'a.ts': 'a', 'b/c.ts': 'c' });
    const paths = [join(root, 'a.ts'), join(root, 'b', 'c.ts')];

    const first = await assembleSnapshot('demo', root, paths, { concurrency: 1 });
    const second = await assembleSnapshot('demo', root, paths, { concurrency: 4 });
    expect(second).toBe(first);
  });
});
