import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { DailyDiscovery, parseDailyFileName } from '../daily-discovery.js';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';

const TEST_DIR = path.join(tmpdir(), 'note-topics-discovery-test');

describe('parseDailyFileName', () => {
  it('yyyy-mm-dd.<ext> から日付を取り出す', () => {
    expect(parseDailyFileName('2023-01-15.md', '.md')).toEqual({ kind: 'daily', date: '2023-01-15' });
    expect(parseDailyFileName('2024-02-29.md', '.md')).toEqual({ kind: 'daily', date: '2024-02-29' });
  });

  it('存在しない日付はinvalid-date', () => {
    expect(parseDailyFileName('2023-02-30.md', '.md')).toEqual({
      kind: 'invalid-date',
      date: '2023-02-30',
    });
    expect(parseDailyFileName('2023-13-01.md', '.md')?.kind).toBe('invalid-date');
  });

  it('パターンに合わないファイルはnull', () => {
    expect(parseDailyFileName('memo.md', '.md')).toBeNull();
    expect(parseDailyFileName('2023-1-5.md', '.md')).toBeNull();
    expect(parseDailyFileName('2023-01-15.txt', '.md')).toBeNull();
    expect(parseDailyFileName('2023-01-15 copy.md', '.md')).toBeNull();
  });
});

describe('DailyDiscovery', () => {
  beforeAll(async () => {
    await fs.mkdir(path.join(TEST_DIR, 'oldfiles'), { recursive: true });

    await fs.writeFile(path.join(TEST_DIR, '2023-01-16.md'), '# B\nsecond\n');
    await fs.writeFile(path.join(TEST_DIR, '2023-01-15.md'), '# A\nfirst\n');
    await fs.writeFile(path.join(TEST_DIR, '2023-02-30.md'), 'invalid');
    await fs.writeFile(path.join(TEST_DIR, 'memo.md'), 'memo');
    await fs.writeFile(path.join(TEST_DIR, '2023-01-17.txt'), 'text');
    await fs.writeFile(path.join(TEST_DIR, 'oldfiles', '2023-01-01.md'), 'archived');
  });

  afterAll(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  it('日次ファイルを日付の昇順で読み込む', async () => {
    const discovery = new DailyDiscovery({ inputDir: TEST_DIR, extension: '.md' });

    const { documents } = await discovery.findDocuments();

    expect(documents).toEqual([
      { date: '2023-01-15', path: path.join(TEST_DIR, '2023-01-15.md'), rawText: '# A\nfirst\n' },
      { date: '2023-01-16', path: path.join(TEST_DIR, '2023-01-16.md'), rawText: '# B\nsecond\n' },
    ]);
  });

  it('同時読み込み数を1にしても全件を読み込む', async () => {
    const discovery = new DailyDiscovery({ inputDir: TEST_DIR, extension: '.md', maxConcurrent: 1 });

    const { documents } = await discovery.findDocuments();

    expect(documents.map((doc) => doc.date)).toEqual(['2023-01-15', '2023-01-16']);
  });

  it('存在しない日付のファイルは診断に記録する', async () => {
    const discovery = new DailyDiscovery({ inputDir: TEST_DIR, extension: '.md' });

    const { diagnostics } = await discovery.findDocuments();

    expect(diagnostics).toEqual([
      {
        kind: 'InvalidDate',
        severity: 'warning',
        path: path.join(TEST_DIR, '2023-02-30.md'),
        reason: '2023-02-30 is not a calendar date',
      },
    ]);
  });

  it('拡張子を設定できる', async () => {
    const discovery = new DailyDiscovery({ inputDir: TEST_DIR, extension: '.txt' });

    const { documents } = await discovery.findDocuments();

    expect(documents.map((doc) => doc.date)).toEqual(['2023-01-17']);
  });
});
