import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { isAudioFile, scanAudiobookFolders } from './traverser.js';
import type { ScanRecord } from './types.js';

async function collect(root: string, ignoreFilePatterns?: string[]): Promise<ScanRecord[]> {
  const records: ScanRecord[] = [];
  for await (const record of scanAudiobookFolders(root, { ignoreFilePatterns })) {
    records.push(record);
  }
  return records;
}

describe('isAudioFile', () => {
  it('should recognize audio extensions regardless of case', () => {
    expect(isAudioFile('chapter1.MP3')).toBe(true);
    expect(isAudioFile('book.m4b')).toBe(true);
    expect(isAudioFile('track.Flac')).toBe(true);
  });

  it('should reject other extensions', () => {
    expect(isAudioFile('cover.jpg')).toBe(false);
    expect(isAudioFile('notes.txt')).toBe(false);
    expect(isAudioFile('mp3')).toBe(false);
  });
});

describe('scanAudiobookFolders', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'audiobook-organizer-scan-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should yield a record for a folder with audio files', async () => {
    const bookDir = path.join(tempDir, 'Author', 'BookA');
    await fs.mkdir(bookDir, { recursive: true });
    await fs.writeFile(path.join(bookDir, 'chapter1.mp3'), 'audio');
    await fs.writeFile(path.join(bookDir, 'cover.jpg'), 'image');

    const records = await collect(tempDir);

    expect(records).toEqual([
      {
        relativePath: 'Author/BookA',
        fullPath: bookDir,
        folderName: 'BookA',
        parentName: 'Author',
        files: ['chapter1.mp3', 'cover.jpg'],
        audioFiles: ['chapter1.mp3'],
      },
    ]);
  });

  it('should report nested audio folders independently', async () => {
    await fs.mkdir(path.join(tempDir, 'Series', 'Book1'), { recursive: true });
    await fs.mkdir(path.join(tempDir, 'Series', 'Book2'), { recursive: true });
    await fs.writeFile(path.join(tempDir, 'Series', 'intro.mp3'), 'audio');
    await fs.writeFile(path.join(tempDir, 'Series', 'Book1', 'part1.m4b'), 'audio');
    await fs.writeFile(path.join(tempDir, 'Series', 'Book2', 'part1.m4b'), 'audio');

    const records = await collect(tempDir);

    expect(records.map(r => r.relativePath)).toEqual(['Series', 'Series/Book1', 'Series/Book2']);
    expect(records[0].files).toEqual(['Book1', 'Book2', 'intro.mp3']);
    expect(records[0].parentName).toBe('');
  });

  it('should skip folders that only contain subdirectories', async () => {
    await fs.mkdir(path.join(tempDir, 'Empty', 'Deeper'), { recursive: true });
    await fs.writeFile(path.join(tempDir, 'Empty', 'Deeper', 'a.ogg'), 'audio');

    const records = await collect(tempDir);

    expect(records.map(r => r.relativePath)).toEqual(['Empty/Deeper']);
  });

  it('should not report audio files placed directly in the root', async () => {
    await fs.writeFile(path.join(tempDir, 'loose.mp3'), 'audio');

    expect(await collect(tempDir)).toEqual([]);
  });

  it('should not treat a directory with an audio extension as audio', async () => {
    await fs.mkdir(path.join(tempDir, 'Book', 'disc.mp3'), { recursive: true });

    expect(await collect(tempDir)).toEqual([]);
  });

  it('should count symlinked audio files but not descend into symlinked folders', async () => {
    const storeDir = path.join(tempDir, 'store');
    await fs.mkdir(storeDir);
    await fs.writeFile(path.join(storeDir, 'real.mp3'), 'audio');
    const scanRoot = path.join(tempDir, 'in');
    const bookDir = path.join(scanRoot, 'Book');
    await fs.mkdir(bookDir, { recursive: true });
    await fs.symlink(path.join(storeDir, 'real.mp3'), path.join(bookDir, 'ch1.mp3'));
    await fs.symlink(storeDir, path.join(bookDir, 'linked-dir'));

    const records = await collect(scanRoot);

    expect(records.map(r => r.relativePath)).toEqual(['Book']);
    expect(records[0].audioFiles).toEqual(['ch1.mp3']);
    expect(records[0].files).toEqual(['ch1.mp3', 'linked-dir']);
  });

  it('should ignore dangling audio symlinks', async () => {
    const bookDir = path.join(tempDir, 'Book');
    await fs.mkdir(bookDir);
    await fs.symlink(path.join(tempDir, 'gone.mp3'), path.join(bookDir, 'ch1.mp3'));

    expect(await collect(tempDir)).toEqual([]);
  });

  it('should leave ignored entries out of listings', async () => {
    const bookDir = path.join(tempDir, 'Book');
    await fs.mkdir(bookDir);
    await fs.writeFile(path.join(bookDir, '._chapter1.mp3'), 'resource fork');
    await fs.writeFile(path.join(bookDir, 'chapter1.mp3'), 'audio');
    await fs.writeFile(path.join(bookDir, '.DS_Store'), '');

    const records = await collect(tempDir, ['^\\._', '^\\.DS_Store$']);

    expect(records).toHaveLength(1);
    expect(records[0].files).toEqual(['chapter1.mp3']);
    expect(records[0].audioFiles).toEqual(['chapter1.mp3']);
  });

  it('should not yield a folder whose only audio files are ignored', async () => {
    const bookDir = path.join(tempDir, 'Book');
    await fs.mkdir(bookDir);
    await fs.writeFile(path.join(bookDir, '._chapter1.mp3'), 'resource fork');

    expect(await collect(tempDir, ['^\\._'])).toEqual([]);
  });

  it('should produce the same keys on every scan', async () => {
    await fs.mkdir(path.join(tempDir, 'b', 'x'), { recursive: true });
    await fs.mkdir(path.join(tempDir, 'a'), { recursive: true });
    await fs.writeFile(path.join(tempDir, 'b', 'x', '1.wav'), 'audio');
    await fs.writeFile(path.join(tempDir, 'a', '1.aac'), 'audio');

    const first = (await collect(tempDir)).map(r => r.relativePath);
    const second = (await collect(tempDir)).map(r => r.relativePath);

    expect(first).toEqual(['a', 'b/x']);
    expect(second).toEqual(first);
  });

  it('should throw when the root cannot be read', async () => {
    await expect(collect(path.join(tempDir, 'missing'))).rejects.toThrow();
  });
});
