import { promises as fs } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import type { IsoDate, SectionsConfig, TopicBuffer, TopicEntry } from '@note-topics/types';
import { isNotFound, toError } from '../utils/errors.js';

/** 既存ファイルの末尾を読むときの初期サイズ（バイト） */
const TAIL_CHUNK_SIZE = 4096;

/** 日付見出し行 */
const DATE_HEADING_PATTERN = /^## (\d{4}-\d{2}-\d{2})[ \t]*$/gm;

export interface OutputWriterOptions {
  /** 出力ディレクトリ */
  outputDir: string;
  /** 前文トピックのタイトル */
  sections: SectionsConfig;
}

export type WriteOutcome =
  | { kind: 'created'; path: string; written: TopicEntry[]; skipped: TopicEntry[] }
  | { kind: 'appended'; path: string; written: TopicEntry[]; skipped: TopicEntry[] }
  | { kind: 'unchanged'; path: string; skipped: TopicEntry[] }
  | { kind: 'failed'; path: string; error: Error };

interface ExistingTail {
  size: number;
  /** 末尾の内容 */
  tail: string;
  /** 末尾に見つかった最後の日付見出し */
  lastDate: IsoDate | null;
}

/**
 * トピックバッファを出力ファイルへ書き出すクラス
 *
 * 既存ファイルは追記のみ。既存の内容は読み直さず書き換えもしない。
 */
export class OutputWriter {
  constructor(private options: OutputWriterOptions) {}

  /**
   * 出力ファイルのパス
   */
  pathFor(fileName: string): string {
    return join(this.options.outputDir, fileName);
  }

  /**
   * 出力ファイルに書き込み済みの最後の日付
   * @returns ファイルがない、または日付見出しがない場合null
   */
  async lastPersistedDate(fileName: string): Promise<IsoDate | null> {
    const existing = await readTail(this.pathFor(fileName));
    return existing?.lastDate ?? null;
  }

  /**
   * バッファを書き出す
   * 既存ファイルの最後の日付以前のエントリは書き込まない（再実行時の重複防止）
   * @param since 書き込み済みとみなす最後の日付。省略時はファイル末尾から読む。
   *   同じ実行で同じファイルに複数回書く場合は、最初の書き込み前に読んだ値を渡す
   */
  async flush(buffer: TopicBuffer, since?: IsoDate | null): Promise<WriteOutcome> {
    const filePath = this.pathFor(buffer.fileName);

    try {
      const existing = await readTail(filePath);
      const lastDate = since === undefined ? existing?.lastDate ?? null : since;
      const written = lastDate
        ? buffer.entries.filter((entry) => entry.date > lastDate)
        : buffer.entries;
      const skipped = buffer.entries.filter((entry) => !written.includes(entry));

      if (written.length === 0) {
        return { kind: 'unchanged', path: filePath, skipped };
      }

      const units = written.map(formatEntry).join('');

      if (existing && existing.size > 0) {
        await fs.appendFile(filePath, separatorAfter(existing.tail) + units, 'utf-8');
        return { kind: 'appended', path: filePath, written, skipped };
      }

      await fs.mkdir(dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, `# ${this.titleFor(buffer.label)}\n\n${units}`, 'utf-8');
      return { kind: 'created', path: filePath, written, skipped };
    } catch (error) {
      return { kind: 'failed', path: filePath, error: toError(error) };
    }
  }

  /**
   * 新規ファイルのタイトル
   */
  private titleFor(label: string): string {
    const { introductionLabel, introductionTitle } = this.options.sections;
    return label === introductionLabel ? introductionTitle : label;
  }
}

/**
 * 1日分の出力単位
 */
export function formatEntry(entry: TopicEntry): string {
  return `## ${entry.date}\n\n${entry.body}\n\n`;
}

/**
 * 既存内容の末尾に応じた区切り（空行1つになるように）
 */
export function separatorAfter(tail: string): string {
  if (tail.endsWith('\n\n')) {
    return '';
  }
  return tail.endsWith('\n') ? '\n' : '\n\n';
}

/**
 * 既存ファイルの末尾を読む
 * 日付見出しが見つかるまで読む範囲を広げる
 * @returns ファイルが存在しない場合null
 */
async function readTail(filePath: string): Promise<ExistingTail | null> {
  let handle: FileHandle;
  try {
    handle = await fs.open(filePath, 'r');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }

  try {
    const { size } = await handle.stat();
    let length = Math.min(size, TAIL_CHUNK_SIZE);

    while (true) {
      const buffer = Buffer.alloc(length);
      await handle.read(buffer, 0, length, size - length);
      const tail = buffer.toString('utf-8');
      const lastDate = findLastDate(tail);

      if (lastDate || length === size) {
        return { size, tail, lastDate };
      }
      length = Math.min(size, length * 4);
    }
  } finally {
    await handle.close();
  }
}

/**
 * 最後の日付見出しを探す
 */
export function findLastDate(text: string): IsoDate | null {
  let lastDate: IsoDate | null = null;
  for (const match of text.matchAll(DATE_HEADING_PATTERN)) {
    lastDate = match[1];
  }
  return lastDate;
}
