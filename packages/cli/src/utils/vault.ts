/**
 * Vault・入出力ディレクトリの解決ユーティリティ
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { NoteTopicsConfig } from '@note-topics/types';

export interface ResolveVaultPathsOptions {
  /** Vaultのパス */
  vault: string;
  /** 入力ディレクトリ名（Vault相対、設定より優先） */
  inputDir?: string;
  /** 出力ディレクトリ名（Vault相対、設定より優先） */
  outputDir?: string;
  config: NoteTopicsConfig;
}

export interface VaultPaths {
  vaultDir: string;
  inputPath: string;
  outputPath: string;
}

/**
 * Vaultルートを正規化
 * - 絶対パスに変換
 * - シンボリックリンクを解決
 */
export async function normalizeVaultRoot(vault: string): Promise<string> {
  const absolutePath = path.resolve(vault);

  try {
    return await fs.realpath(absolutePath);
  } catch (_error) {
    // 存在しない場合は絶対パスをそのまま返す（存在確認は呼び出し側）
    return absolutePath;
  }
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(dirPath);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

/**
 * 入出力ディレクトリを解決
 * - Vaultと入力ディレクトリは存在している必要がある
 * - 出力ディレクトリはなければ作る
 * 出力ディレクトリ名の優先順位: オプション > 設定ファイル > 入力ディレクトリ名 + サフィックス
 */
export async function resolveVaultPaths(options: ResolveVaultPathsOptions): Promise<VaultPaths> {
  const vaultDir = await normalizeVaultRoot(options.vault);

  if (!(await isDirectory(vaultDir))) {
    throw new Error(`${vaultDir} is not a valid directory`);
  }

  const { directories } = options.config;
  const inputName = options.inputDir ?? directories.input;
  const inputPath = path.join(vaultDir, inputName);

  if (!(await isDirectory(inputPath))) {
    throw new Error(`Input directory '${inputName}' does not exist in the vault`);
  }

  const outputName =
    options.outputDir ?? directories.output ?? `${inputName}${directories.outputSuffix}`;
  const outputPath = path.join(vaultDir, outputName);
  await fs.mkdir(outputPath, { recursive: true });

  return { vaultDir, inputPath, outputPath };
}
