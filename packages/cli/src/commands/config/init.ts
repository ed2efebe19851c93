/**
 * config init コマンド
 * Vaultに設定ファイルを生成する
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { CONFIG_FILE_NAMES } from '@note-topics/core';
import { DEFAULT_CONFIG, type NoteTopicsConfig } from '@note-topics/types';

export interface ConfigInitOptions {
  /** Vaultのパス（デフォルト: cwd） */
  vault?: string;
  /** 入力ディレクトリ名 */
  inputDir?: string;
  /** 既存ファイルを上書き */
  force?: boolean;
}

/**
 * 設定オブジェクトを生成
 */
function createConfig(options: { inputDir?: string }): NoteTopicsConfig {
  return {
    ...DEFAULT_CONFIG,
    directories: {
      ...DEFAULT_CONFIG.directories,
      input: options.inputDir ?? DEFAULT_CONFIG.directories.input,
    },
  };
}

/**
 * config init コマンドを実行
 * @returns 生成したファイルのパス
 */
export async function initConfig(options: ConfigInitOptions = {}): Promise<string> {
  const vaultDir = path.resolve(options.vault ?? process.cwd());
  const configPath = path.join(vaultDir, CONFIG_FILE_NAMES[0]);

  // 既存ファイルチェック
  const exists = await fs
    .access(configPath)
    .then(() => true)
    .catch(() => false);

  if (exists && !options.force) {
    throw new Error(
      `Configuration file already exists: ${configPath}\n` +
        'Use --force to overwrite the existing file.'
    );
  }

  const config = createConfig({ inputDir: options.inputDir });
  await fs.writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');

  return configPath;
}

/**
 * config init コマンドを実行（CLI用）
 */
export async function executeConfigInit(options: ConfigInitOptions): Promise<void> {
  try {
    const configPath = await initConfig(options);
    console.log('✅ Configuration file created successfully!');
    console.log(`📄 File: ${configPath}`);
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}
