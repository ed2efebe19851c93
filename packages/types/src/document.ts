/**
 * 日次ドキュメントの型定義
 */

/** yyyy-mm-dd 形式の日付文字列 */
export type IsoDate = string;

export interface DailyDocument {
  /** ファイル名から抽出した日付（yyyy-mm-dd） */
  date: IsoDate;
  /** ファイルの絶対パス */
  path: string;
  /** 全文 */
  rawText: string;
}
