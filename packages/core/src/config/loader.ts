import { readFile, access } from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';
import type { NoteTopicsConfig } from '@note-topics/types';
import { DEFAULT_CONFIG } from '@note-topics/types';
import { validateConfig, type PartialConfig } from './validator.js';
import { isNotFound, toError } from '../utils/errors.js';

/**
 * 設定ファイル名の候補
 * 優先順位: .note-topics.json > note-topics.json
 */
export const CONFIG_FILE_NAMES = ['.note-topics.json', 'note-topics.json'];

export interface ResolveConfigOptions {
  /** Vaultルート（設定ファイルを探す場所） */
  vaultDir: string;
  /** 明示的に指定された設定ファイルパス */
  configPath?: string;
}

export class ConfigLoader {
  /**
   * 設定ファイルを読み込む
   * @param configPath 設定ファイルのパス
   * @returns 設定オブジェクト（ファイルがない場合はデフォルト設定）
   */
  static async load(configPath: string): Promise<NoteTopicsConfig> {
    try {
      // ファイルの存在確認
      await access(configPath, constants.F_OK | constants.R_OK);

      const content = await readFile(configPath, 'utf-8');
      let parsed: unknown;
      try {
        parsed = JSON.parse(content);
      } catch (error) {
        throw new Error(`Invalid JSON in ${configPath}: ${toError(error).message}`);
      }

      // バリデーション
      const config = validateConfig(parsed);

      // デフォルト値とマージ
      return this.mergeWithDefaults(config);
    } catch (error) {
      if (isNotFound(error)) {
        return DEFAULT_CONFIG;
      }
      throw error;
    }
  }

  /**
   * 設定ファイルを解決して読み込む
   * - 明示的なパスがあればそれを使う（存在しなければエラー）
   * - なければVaultルートの候補ファイルを探す
   */
  static async resolve(
    options: ResolveConfigOptions
  ): Promise<{ config: NoteTopicsConfig; configPath: string | null }> {
    if (options.configPath) {
      const configPath = path.resolve(options.vaultDir, options.configPath);
      try {
        await access(configPath, constants.F_OK);
      } catch {
        throw new Error(`Configuration file not found: ${configPath}`);
      }
      return { config: await this.load(configPath), configPath };
    }

    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(options.vaultDir, fileName);
      try {
        await access(configPath, constants.F_OK);
      } catch {
        continue;
      }
      return { config: await this.load(configPath), configPath };
    }

    return { config: this.getDefaultConfig(), configPath: null };
  }

  /**
   * デフォルト設定を取得
   */
  static getDefaultConfig(): NoteTopicsConfig {
    return DEFAULT_CONFIG;
  }

  /**
   * 設定とデフォルト値をマージ
   */
  static mergeWithDefaults(config: PartialConfig): NoteTopicsConfig {
    return {
      version: config.version ?? DEFAULT_CONFIG.version,
      directories: {
        input: config.directories?.input ?? DEFAULT_CONFIG.directories.input,
        output: config.directories?.output ?? DEFAULT_CONFIG.directories.output,
        outputSuffix: config.directories?.outputSuffix ?? DEFAULT_CONFIG.directories.outputSuffix,
        archive: config.directories?.archive ?? DEFAULT_CONFIG.directories.archive,
      },
      files: {
        extension: config.files?.extension ?? DEFAULT_CONFIG.files.extension,
      },
      images: {
        extensions: config.images?.extensions ?? DEFAULT_CONFIG.images.extensions,
      },
      sections: {
        introductionLabel:
          config.sections?.introductionLabel ?? DEFAULT_CONFIG.sections.introductionLabel,
        introductionTitle:
          config.sections?.introductionTitle ?? DEFAULT_CONFIG.sections.introductionTitle,
      },
    };
  }
}
