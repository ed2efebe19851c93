import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { ArchiveMover, relocate, type FileOps } from '../archive-mover.js';

function fakeOps(overrides: Partial<FileOps>): FileOps {
  return {
    rename: vi.fn(async () => {}),
    copyFile: vi.fn(async () => {}),
    unlink: vi.fn(async () => {}),
    ...overrides,
  };
}

function failing(message: string): () => Promise<void> {
  return vi.fn(async () => {
    throw new Error(message);
  });
}

describe('relocate', () => {
  it('renameできればそのまま移動する', async () => {
    const ops = fakeOps({});

    const outcome = await relocate('/in/a.md', '/in/oldfiles/a.md', ops);

    expect(outcome).toEqual({ kind: 'relocated' });
    expect(ops.copyFile).not.toHaveBeenCalled();
  });

  it('renameに失敗したらコピーして元を削除する', async () => {
    const ops = fakeOps({ rename: failing('EXDEV') });

    const outcome = await relocate('/in/a.md', '/in/oldfiles/a.md', ops);

    expect(outcome).toEqual({ kind: 'relocated' });
    expect(ops.copyFile).toHaveBeenCalledWith('/in/a.md', '/in/oldfiles/a.md');
    expect(ops.unlink).toHaveBeenCalledWith('/in/a.md');
  });

  it('元ファイルを削除できなければcopied-not-deleted', async () => {
    const ops = fakeOps({ rename: failing('EPERM'), unlink: failing('EBUSY') });

    const outcome = await relocate('/in/a.md', '/in/oldfiles/a.md', ops);

    expect(outcome.kind).toBe('copied-not-deleted');
    if (outcome.kind === 'copied-not-deleted') {
      expect(outcome.error.message).toBe('EBUSY');
    }
  });

  it('コピーもできなければfailed', async () => {
    const ops = fakeOps({ rename: failing('EPERM'), copyFile: failing('ENOSPC') });

    const outcome = await relocate('/in/a.md', '/in/oldfiles/a.md', ops);

    expect(outcome.kind).toBe('failed');
    if (outcome.kind === 'failed') {
      expect(outcome.error.message).toBe('rename failed: EPERM; copy failed: ENOSPC');
    }
    expect(ops.unlink).not.toHaveBeenCalled();
  });
});

describe('ArchiveMover', () => {
  let testDir: string;
  let inputDir: string;
  let outputDir: string;
  let mover: ArchiveMover;

  beforeEach(async () => {
    testDir = path.join(tmpdir(), `note-topics-archive-test-${Date.now()}`);
    inputDir = path.join(testDir, 'input');
    outputDir = path.join(testDir, 'output');
    await fs.mkdir(path.join(inputDir, 'assets'), { recursive: true });
    mover = new ArchiveMover({ inputDir, outputDir, archiveDir: 'oldfiles' });
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('ドキュメントを退避ディレクトリへ移動する', async () => {
    const source = path.join(inputDir, '2023-01-15.md');
    await fs.writeFile(source, '# Travel\nKyoto\n');

    const { destination, outcome } = await mover.archiveDocument({
      date: '2023-01-15',
      path: source,
      rawText: '# Travel\nKyoto\n',
    });

    expect(outcome).toEqual({ kind: 'relocated' });
    expect(destination).toBe(path.join(inputDir, 'oldfiles', '2023-01-15.md'));
    expect(await fs.readFile(destination, 'utf-8')).toBe('# Travel\nKyoto\n');
    await expect(fs.access(source)).rejects.toThrow();
  });

  it('画像をサブパスなしで出力先にコピーする', async () => {
    const source = path.join(inputDir, 'assets', 'photo.png');
    await fs.writeFile(source, 'png');

    const outcome = await mover.copyImage({
      target: 'assets/photo.png',
      syntax: 'wiki',
      sourcePath: source,
    });

    expect(outcome).toEqual({ kind: 'copied', destination: path.join(outputDir, 'photo.png') });
    expect(await fs.readFile(path.join(outputDir, 'photo.png'), 'utf-8')).toBe('png');
    // コピーなので元は残る
    expect(await fs.readFile(source, 'utf-8')).toBe('png');
  });

  it('画像が消えていればfailedを返す', async () => {
    const outcome = await mover.copyImage({
      target: 'gone.png',
      syntax: 'wiki',
      sourcePath: path.join(inputDir, 'gone.png'),
    });

    expect(outcome.kind).toBe('failed');
  });
});
