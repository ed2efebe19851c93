/**
 * 実行結果と診断情報の型定義
 */

export type DiagnosticKind =
  | 'ParseDegraded'
  | 'ParseFailed'
  | 'UnresolvableImage'
  | 'ImageCopyFailed'
  | 'MoveFailed'
  | 'NotArchived'
  | 'WriteFailed'
  | 'DuplicateDate'
  | 'InvalidDate'
  | 'ReadFailed'
  | 'AlreadyPersisted';

/**
 * warning: 理由付きでスキップした（実行はdoneのまま）
 * error: 処理できなかった（実行はfailed-partialになる）
 */
export type DiagnosticSeverity = 'warning' | 'error';

export interface Diagnostic {
  kind: DiagnosticKind;
  severity: DiagnosticSeverity;
  /** 対象のファイルパス（トピックの場合は出力ファイルのパス） */
  path: string;
  reason: string;
}

export const DIAGNOSTIC_SEVERITY: Record<DiagnosticKind, DiagnosticSeverity> = {
  ParseDegraded: 'warning',
  ParseFailed: 'error',
  UnresolvableImage: 'warning',
  ImageCopyFailed: 'error',
  MoveFailed: 'error',
  NotArchived: 'error',
  WriteFailed: 'error',
  DuplicateDate: 'warning',
  InvalidDate: 'warning',
  ReadFailed: 'error',
  AlreadyPersisted: 'warning',
};

/** 診断を生成 */
export function createDiagnostic(kind: DiagnosticKind, path: string, reason: string): Diagnostic {
  return { kind, severity: DIAGNOSTIC_SEVERITY[kind], path, reason };
}

export type RunStatus = 'done' | 'failed-partial';

export interface ProcessResult {
  status: RunStatus;
  /** 書き込んだトピックのラベル */
  topicsWritten: string[];
  /** アーカイブしたドキュメントの元パス */
  archived: string[];
  /** 出力先にコピーした画像のパス */
  copiedImages: string[];
  diagnostics: Diagnostic[];
}
