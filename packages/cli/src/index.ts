#!/usr/bin/env node
/**
 * note-topics CLI
 */

import { Command, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { executeRun, type RunCommandOptions } from './commands/run.js';
import { executeConfigInit, type ConfigInitOptions } from './commands/config/init.js';

// package.jsonからバージョンを読み込む
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8')) as {
  version: string;
};

const program = new Command();

program
  .name('note-topics')
  .description('日次ノートを見出しごとのトピックファイルにまとめる')
  .version(packageJson.version);

// run コマンド（デフォルト）
program
  .command('run', { isDefault: true })
  .description('日次ノートを処理してトピックファイルに追記')
  .argument('<vault>', 'Obsidian Vaultのパス')
  .option('-i, --input-dir <name>', "入力ディレクトリ名（デフォルト: '日々の記録'）")
  .option('-o, --output-dir <name>', '出力ディレクトリ名（デフォルト: 入力ディレクトリ名 + まとめ）')
  .addOption(
    new Option('-c, --config <path>', '設定ファイルのパス').env('NOTE_TOPICS_CONFIG')
  )
  .addOption(
    new Option('--format <format>', '出力形式').choices(['text', 'json']).default('text')
  )
  .action((vault: string, options: RunCommandOptions) => {
    void executeRun(vault, options);
  });

// config コマンド
const configCmd = program
  .command('config')
  .description('設定管理');

configCmd
  .command('init')
  .description('Vaultに設定ファイルを生成')
  .argument('[vault]', 'Obsidian Vaultのパス（デフォルト: カレントディレクトリ）')
  .option('-i, --input-dir <name>', '入力ディレクトリ名')
  .option('-f, --force', '既存ファイルを上書き')
  .action((vault: string | undefined, options: Omit<ConfigInitOptions, 'vault'>) => {
    void executeConfigInit({ ...options, vault });
  });

// コマンドラインを解析
program.parse(process.argv);
