/**
 * run コマンド
 * 日次ノートをトピックごとのファイルにまとめる
 */

import { ConfigLoader, RunOrchestrator } from '@note-topics/core';
import type { ProcessResult } from '@note-topics/types';
import { resolveVaultPaths } from '../utils/vault.js';
import { formatResultAsJson, formatResultAsText } from '../utils/output.js';

/**
 * run コマンドのオプション
 */
export interface RunCommandOptions {
  /** 入力ディレクトリ名（Vault相対） */
  inputDir?: string;
  /** 出力ディレクトリ名（Vault相対） */
  outputDir?: string;
  /** 設定ファイルのパス */
  config?: string;
  format?: 'text' | 'json';
}

/** 一部のファイルを処理できなかった場合の終了コード */
export const EXIT_PARTIAL = 2;

/**
 * Vaultを処理
 * Vaultや入力ディレクトリが存在しない場合はエラーを投げる
 */
export async function runNotes(vault: string, options: RunCommandOptions): Promise<ProcessResult> {
  const { config } = await ConfigLoader.resolve({
    vaultDir: vault,
    configPath: options.config,
  });

  const { inputPath, outputPath } = await resolveVaultPaths({
    vault,
    inputDir: options.inputDir,
    outputDir: options.outputDir,
    config,
  });

  const orchestrator = new RunOrchestrator({
    inputDir: inputPath,
    outputDir: outputPath,
    config,
    // JSON出力時は標準出力を汚さない
    quiet: options.format === 'json',
  });

  return orchestrator.run();
}

/**
 * run コマンドを実行
 */
export async function executeRun(vault: string, options: RunCommandOptions): Promise<void> {
  try {
    const result = await runNotes(vault, options);

    if (options.format === 'json') {
      console.log(formatResultAsJson(result));
    } else {
      console.log();
      console.log(formatResultAsText(result));
    }

    if (result.status === 'failed-partial') {
      process.exitCode = EXIT_PARTIAL;
    }
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}
