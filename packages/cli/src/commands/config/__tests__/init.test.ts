/**
 * config init コマンドのテスト
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { ConfigLoader } from '@note-topics/core';
import { initConfig } from '../init.js';

describe('config init', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(async () => {
    // 各テストで独立したディレクトリを作成
    testDir = path.join(tmpdir(), `.test-config-init-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    configPath = path.join(testDir, '.note-topics.json');
    await fs.mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    // テストディレクトリを削除
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('設定ファイルを生成できる', async () => {
    const created = await initConfig({ vault: testDir });

    expect(created).toBe(configPath);
    const config = JSON.parse(await fs.readFile(configPath, 'utf-8'));
    expect(config.version).toBe('1.0');
    expect(config.directories.input).toBe('日々の記録');
    expect(config.directories.archive).toBe('oldfiles');
  });

  it('入力ディレクトリ名を指定できる', async () => {
    await initConfig({ vault: testDir, inputDir: 'journal' });

    const config = JSON.parse(await fs.readFile(configPath, 'utf-8'));
    expect(config.directories.input).toBe('journal');
  });

  it('既存ファイルがある場合はエラーを投げる', async () => {
    await initConfig({ vault: testDir });

    await expect(initConfig({ vault: testDir })).rejects.toThrow('Configuration file already exists');
  });

  it('--forceオプションで既存ファイルを上書きできる', async () => {
    await initConfig({ vault: testDir, inputDir: 'first' });
    await initConfig({ vault: testDir, inputDir: 'second', force: true });

    const config = JSON.parse(await fs.readFile(configPath, 'utf-8'));
    expect(config.directories.input).toBe('second');
  });

  it('生成された設定ファイルをそのまま読み込める', async () => {
    await initConfig({ vault: testDir });

    const { config, configPath: resolved } = await ConfigLoader.resolve({ vaultDir: testDir });
    expect(resolved).toBe(configPath);
    expect(config).toEqual(ConfigLoader.getDefaultConfig());
  });
});
