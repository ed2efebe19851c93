import fg from 'fast-glob';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { DailyDocument, Diagnostic, IsoDate } from '@note-topics/types';
import { createDiagnostic } from '@note-topics/types';
import { toError } from '../utils/errors.js';
import { mapInBatches } from '../utils/batch.js';

/** 同時に開くファイル数の既定値 */
export const DEFAULT_MAX_CONCURRENT_READS = 16;

/** yyyy-mm-dd */
const DAILY_NAME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface DailyDiscoveryOptions {
  /** 入力ディレクトリ */
  inputDir: string;
  /** 日次ファイルの拡張子 */
  extension: string;
  /** 同時に読み込むファイル数 */
  maxConcurrent?: number;
}

export interface DiscoveryResult {
  /** 読み込んだ日次ドキュメント（日付の昇順） */
  documents: DailyDocument[];
  diagnostics: Diagnostic[];
}

export type ParsedDailyName =
  | { kind: 'daily'; date: IsoDate }
  | { kind: 'invalid-date'; date: string };

/**
 * ファイル名から日付を取り出す
 * @returns yyyy-mm-dd.<ext> に一致しない場合null
 */
export function parseDailyFileName(fileName: string, extension: string): ParsedDailyName | null {
  if (!fileName.endsWith(extension)) {
    return null;
  }

  const stem = fileName.slice(0, fileName.length - extension.length);
  const match = DAILY_NAME_PATTERN.exec(stem);
  if (!match) {
    return null;
  }

  const [, year, month, day] = match;
  const parsed = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  const isCalendarDate =
    parsed.getUTCFullYear() === Number(year) &&
    parsed.getUTCMonth() === Number(month) - 1 &&
    parsed.getUTCDate() === Number(day);

  return isCalendarDate ? { kind: 'daily', date: stem } : { kind: 'invalid-date', date: stem };
}

/**
 * 日次ドキュメント検索クラス
 * 入力ディレクトリ直下の yyyy-mm-dd.<ext> を探す（サブディレクトリは見ない）
 */
export class DailyDiscovery {
  private inputDir: string;
  private extension: string;
  private maxConcurrent: number;

  constructor(options: DailyDiscoveryOptions) {
    this.inputDir = path.resolve(options.inputDir);
    this.extension = options.extension;
    this.maxConcurrent = options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT_READS;
  }

  /**
   * 日次ドキュメントを検索して読み込む
   */
  async findDocuments(): Promise<DiscoveryResult> {
    const diagnostics: Diagnostic[] = [];
    const candidates: Array<{ date: IsoDate; path: string }> = [];

    const files = await fg(`*${fg.escapePath(this.extension)}`, {
      cwd: this.inputDir,
      onlyFiles: true,
      absolute: false,
      dot: false,
      deep: 1,
    });

    for (const file of files.sort()) {
      const filePath = path.join(this.inputDir, file);
      const parsed = parseDailyFileName(file, this.extension);

      if (!parsed) {
        continue;
      }
      if (parsed.kind === 'invalid-date') {
        diagnostics.push(
          createDiagnostic('InvalidDate', filePath, `${parsed.date} is not a calendar date`)
        );
        continue;
      }
      candidates.push({ date: parsed.date, path: filePath });
    }

    // 読み込みはmaxConcurrent件ずつ並行（EMFILE回避）、結果は元の順序のまま
    const loaded = await mapInBatches(
      candidates,
      this.maxConcurrent,
      async (candidate) => {
        try {
          const rawText = await fs.readFile(candidate.path, 'utf-8');
          return { ...candidate, rawText };
        } catch (error) {
          diagnostics.push(createDiagnostic('ReadFailed', candidate.path, toError(error).message));
          return null;
        }
      }
    );

    const documents = loaded.filter((doc): doc is DailyDocument => doc !== null);
    documents.sort((a, b) => a.date.localeCompare(b.date));

    return { documents, diagnostics };
  }
}
