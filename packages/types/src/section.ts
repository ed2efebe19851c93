/**
 * セクションと画像参照の型定義
 */

export interface Section {
  /** 正規化済みの見出しラベル（先頭の#と前後の空白を除去） */
  label: string;
  /** 見出しから次の見出しまでの本文 */
  body: string;
  /** 文書内の順序（0始まり） */
  order: number;
}

/** 画像参照の記法 */
export type ImageSyntax = 'markdown' | 'wiki';

export interface ImageReference {
  /** 参照先（Vault相対パス） */
  target: string;
  /** 記法 */
  syntax: ImageSyntax;
  /** 解決済みの絶対パス */
  sourcePath: string;
}
