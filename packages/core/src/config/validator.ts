import type {
  DirectoriesConfig,
  FilesConfig,
  ImagesConfig,
  SectionsConfig,
} from '@note-topics/types';

/** 設定ファイルに書かれうる部分的な設定 */
export interface PartialConfig {
  version?: string;
  directories?: Partial<DirectoriesConfig>;
  files?: Partial<FilesConfig>;
  images?: Partial<ImagesConfig>;
  sections?: Partial<SectionsConfig>;
}

/**
 * 設定オブジェクトをバリデーション
 */
export function validateConfig(config: unknown): PartialConfig {
  if (!isRecord(config)) {
    throw new Error('Config must be an object');
  }

  const result: PartialConfig = {};

  // バージョンのチェック
  if (config.version !== undefined) {
    result.version = expectString(config.version, 'config.version');
  }

  if (config.directories !== undefined) {
    result.directories = validateDirectoriesConfig(config.directories);
  }

  if (config.files !== undefined) {
    result.files = validateFilesConfig(config.files);
  }

  if (config.images !== undefined) {
    result.images = validateImagesConfig(config.images);
  }

  if (config.sections !== undefined) {
    result.sections = validateSectionsConfig(config.sections);
  }

  return result;
}

function validateDirectoriesConfig(directories: unknown): Partial<DirectoriesConfig> {
  if (!isRecord(directories)) {
    throw new Error('config.directories must be an object');
  }

  const result: Partial<DirectoriesConfig> = {};

  if (directories.input !== undefined) {
    result.input = expectName(directories.input, 'config.directories.input');
  }

  if (directories.output !== undefined) {
    result.output = expectName(directories.output, 'config.directories.output');
  }

  if (directories.outputSuffix !== undefined) {
    result.outputSuffix = expectString(directories.outputSuffix, 'config.directories.outputSuffix');
  }

  if (directories.archive !== undefined) {
    result.archive = expectName(directories.archive, 'config.directories.archive');
  }

  return result;
}

function validateFilesConfig(files: unknown): Partial<FilesConfig> {
  if (!isRecord(files)) {
    throw new Error('config.files must be an object');
  }

  const result: Partial<FilesConfig> = {};

  if (files.extension !== undefined) {
    result.extension = expectExtension(files.extension, 'config.files.extension');
  }

  return result;
}

function validateImagesConfig(images: unknown): Partial<ImagesConfig> {
  if (!isRecord(images)) {
    throw new Error('config.images must be an object');
  }

  const result: Partial<ImagesConfig> = {};

  if (images.extensions !== undefined) {
    if (!Array.isArray(images.extensions)) {
      throw new Error('config.images.extensions must be an array');
    }
    result.extensions = images.extensions.map((ext: unknown) =>
      expectExtension(ext, 'config.images.extensions')
    );
  }

  return result;
}

function validateSectionsConfig(sections: unknown): Partial<SectionsConfig> {
  if (!isRecord(sections)) {
    throw new Error('config.sections must be an object');
  }

  const result: Partial<SectionsConfig> = {};

  if (sections.introductionLabel !== undefined) {
    result.introductionLabel = expectName(
      sections.introductionLabel,
      'config.sections.introductionLabel'
    );
  }

  if (sections.introductionTitle !== undefined) {
    result.introductionTitle = expectName(
      sections.introductionTitle,
      'config.sections.introductionTitle'
    );
  }

  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectString(value: unknown, name: string): string {
  if (typeof value !== 'string') {
    throw new Error(`${name} must be a string`);
  }
  return value;
}

function expectName(value: unknown, name: string): string {
  const str = expectString(value, name);
  if (!str.trim()) {
    throw new Error(`${name} must not be empty`);
  }
  return str;
}

function expectExtension(value: unknown, name: string): string {
  const str = expectString(value, name);
  if (!/^\.[^./\\]+$/.test(str)) {
    throw new Error(`${name} must look like ".md"`);
  }
  return str;
}
