import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { PageWriter, formatPageRecord } from '../../../../src/core/output/pageWriter';

describe('PageWriter', () => {
  let dir: string;
  let outputPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'docs-snapshot-writer-'));
    outputPath = join(dir, 'out.md');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('formats a page record with title, source and separator', () => {
    expect(
      formatPageRecord({
        title: 'Intro',
        sourceUrl: 'https://docs.example.com/',
        body: '## Intro\nHello world',
      })
    ).toBe('# Intro\nSource: https://docs.example.com/\n\n## Intro\nHello world\n\n---\n\n');
  });

  test('uses the placeholder for an empty body', () => {
    expect(
      formatPageRecord({ title: 'Empty', sourceUrl: 'https://docs.example.com/e', body: '' })
    ).toBe('# Empty\nSource: https://docs.example.com/e\n\n[No extractable content found]\n\n---\n\n');
  });

  test('truncates an existing file and appends records in order', async () => {
    await writeFile(outputPath, 'stale content from a previous run\n');

    const writer = await PageWriter.open(outputPath);
    await writer.writePage({ title: 'A', sourceUrl: 'https://x.com/a', body: 'first' });
    await writer.writePage({ title: 'B', sourceUrl: 'https://x.com/b', body: 'second' });
    await writer.close();

    expect(await readFile(outputPath, 'utf8')).toBe(
      '# A\nSource: https://x.com/a\n\nfirst\n\n---\n\n# B\nSource: https://x.com/b\n\nsecond\n\n---\n\n'
    );
  });

  test('makes each record readable before the writer is closed', async () => {
    const writer = await PageWriter.open(outputPath);
    try {
      await writer.writePage({ title: 'A', sourceUrl: 'https://x.com/a', body: 'first' });
      expect(await readFile(outputPath, 'utf8')).toBe('# A\nSource: https://x.com/a\n\nfirst\n\n---\n\n');
    } finally {
      await writer.close();
    }
  });

  test('close is idempotent and later writes fail', async () => {
    const writer = await PageWriter.open(outputPath);
    await writer.close();
    await writer.close();

    expect(writer.isOpen).toBe(false);
    await expect(
      writer.writePage({ title: 'late', sourceUrl: 'https://x.com/', body: '' })
    ).rejects.toThrow('is already closed');
  });
});
