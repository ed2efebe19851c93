/**
 * 出力フォーマットユーティリティ
 */

import type { Diagnostic, ProcessResult } from '@note-topics/types';

/**
 * 実行結果をJSON形式で出力
 */
export function formatResultAsJson(result: ProcessResult): string {
  return JSON.stringify(result, null, 2);
}

function formatDiagnostic(diagnostic: Diagnostic): string {
  const mark = diagnostic.severity === 'error' ? '✗' : '!';
  return `  ${mark} [${diagnostic.kind}] ${diagnostic.path}: ${diagnostic.reason}`;
}

/**
 * 実行結果をテキスト形式で出力
 */
export function formatResultAsText(result: ProcessResult): string {
  const lines: string[] = [];

  lines.push(result.status === 'done' ? '✓ Done' : '✗ Completed with errors');
  lines.push(`  Topics written: ${result.topicsWritten.length}`);
  if (result.topicsWritten.length > 0) {
    lines.push(`    ${result.topicsWritten.join(', ')}`);
  }
  lines.push(`  Files archived: ${result.archived.length}`);
  lines.push(`  Images copied:  ${result.copiedImages.length}`);

  if (result.diagnostics.length > 0) {
    lines.push('');
    lines.push(`Diagnostics (${result.diagnostics.length}):`);
    for (const diagnostic of result.diagnostics) {
      lines.push(formatDiagnostic(diagnostic));
    }
  }

  return lines.join('\n');
}
