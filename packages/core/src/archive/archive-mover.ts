import { promises as fs } from 'node:fs';
import { basename, join } from 'node:path';
import type { DailyDocument, ImageReference } from '@note-topics/types';
import { toError } from '../utils/errors.js';

/**
 * relocateが使うファイル操作（テストで差し替え可能）
 */
export interface FileOps {
  rename(source: string, destination: string): Promise<void>;
  copyFile(source: string, destination: string): Promise<void>;
  unlink(path: string): Promise<void>;
}

export const nodeFileOps: FileOps = {
  rename: (source, destination) => fs.rename(source, destination),
  copyFile: (source, destination) => fs.cp(source, destination, { preserveTimestamps: true }),
  unlink: (path) => fs.unlink(path),
};

export type RelocateOutcome =
  | { kind: 'relocated' }
  | { kind: 'copied-not-deleted'; error: Error }
  | { kind: 'failed'; error: Error };

/**
 * ファイルを移動
 * 1. rename（アトミック）
 * 2. 失敗したらコピーしてから元ファイルを削除
 */
export async function relocate(
  source: string,
  destination: string,
  ops: FileOps = nodeFileOps
): Promise<RelocateOutcome> {
  let renameError: Error;
  try {
    await ops.rename(source, destination);
    return { kind: 'relocated' };
  } catch (error) {
    // Windowsなどでrenameできない場合はコピー＋削除に切り替える
    renameError = toError(error);
  }

  try {
    await ops.copyFile(source, destination);
  } catch (error) {
    return {
      kind: 'failed',
      error: new Error(`rename failed: ${renameError.message}; copy failed: ${toError(error).message}`),
    };
  }

  try {
    await ops.unlink(source);
    return { kind: 'relocated' };
  } catch (error) {
    return { kind: 'copied-not-deleted', error: toError(error) };
  }
}

export interface ArchiveMoverOptions {
  /** 入力ディレクトリ */
  inputDir: string;
  /** 出力ディレクトリ（画像のコピー先） */
  outputDir: string;
  /** 処理済みファイルの移動先（入力ディレクトリ相対） */
  archiveDir: string;
  ops?: FileOps;
}

export type ImageCopyOutcome =
  | { kind: 'copied'; destination: string }
  | { kind: 'failed'; destination: string; error: Error };

/**
 * 処理済みドキュメントを退避し、参照画像を出力先へコピーするクラス
 */
export class ArchiveMover {
  private archivePath: string;
  private ops: FileOps;

  constructor(private options: ArchiveMoverOptions) {
    this.archivePath = join(options.inputDir, options.archiveDir);
    this.ops = options.ops ?? nodeFileOps;
  }

  /**
   * ドキュメントを退避ディレクトリへ移動
   */
  async archiveDocument(
    document: DailyDocument
  ): Promise<{ destination: string; outcome: RelocateOutcome }> {
    const destination = join(this.archivePath, basename(document.path));

    try {
      await fs.mkdir(this.archivePath, { recursive: true });
    } catch (error) {
      return { destination, outcome: { kind: 'failed', error: toError(error) } };
    }

    const outcome = await relocate(document.path, destination, this.ops);
    return { destination, outcome };
  }

  /**
   * 画像を出力ディレクトリ直下へコピー（サブパスは保持しない）
   */
  async copyImage(reference: ImageReference): Promise<ImageCopyOutcome> {
    const destination = join(this.options.outputDir, basename(reference.sourcePath));

    try {
      await fs.mkdir(this.options.outputDir, { recursive: true });
      await this.ops.copyFile(reference.sourcePath, destination);
      return { kind: 'copied', destination };
    } catch (error) {
      return { kind: 'failed', destination, error: toError(error) };
    }
  }
}
