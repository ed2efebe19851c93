/**
 * トピックバッファの型定義
 */

import type { IsoDate } from './document.js';

export interface TopicEntry {
  date: IsoDate;
  body: string;
}

export interface TopicBuffer {
  /** 最初に現れた見出しラベル（新規ファイルのタイトル） */
  label: string;
  /** 同じ出力ファイルにまとめた見出しラベル（出現順） */
  labels: string[];
  /** 出力ファイル名（拡張子付き、マージキー） */
  fileName: string;
  /** 日付順の寄与 */
  entries: TopicEntry[];
}
