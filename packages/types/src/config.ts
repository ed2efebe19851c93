/**
 * 設定ファイルの型定義
 */

export interface NoteTopicsConfig {
  version: string;
  directories: DirectoriesConfig;
  files: FilesConfig;
  images: ImagesConfig;
  sections: SectionsConfig;
}

export interface DirectoriesConfig {
  /** 入力ディレクトリ名（Vault相対） */
  input: string;
  /** 出力ディレクトリ名（省略時は input + outputSuffix） */
  output?: string;
  /** 出力ディレクトリ名の既定サフィックス */
  outputSuffix: string;
  /** 処理済みファイルの移動先（入力ディレクトリ相対） */
  archive: string;
}

export interface FilesConfig {
  /** 日次ファイルと出力ファイルの拡張子 */
  extension: string;
}

export interface ImagesConfig {
  /** 拡張子なしの参照を解決するときに試す拡張子 */
  extensions: string[];
}

export interface SectionsConfig {
  /** 最初の見出しより前の本文に付けるラベル */
  introductionLabel: string;
  /** そのトピックファイルのタイトル行 */
  introductionTitle: string;
}

/** デフォルト設定 */
export const DEFAULT_CONFIG: NoteTopicsConfig = {
  version: '1.0',
  directories: {
    input: '日々の記録',
    outputSuffix: 'まとめ',
    archive: 'oldfiles',
  },
  files: {
    extension: '.md',
  },
  images: {
    extensions: ['.png', '.jpg', '.jpeg', '.gif', '.bmp', '.svg', '.webp'],
  },
  sections: {
    introductionLabel: 'Introduction',
    introductionTitle: 'はじめに',
  },
};
