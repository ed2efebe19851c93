/** ファイル名に使えない文字 */
const UNSAFE_FILE_NAME_CHARS = /[\\/*?:"<>|]/g;

/**
 * 見出しラベルから出力ファイル名を作る
 * 例: toTopicFileName('見出し 2?*', '.md') → '見出し 2__.md'
 */
export function toTopicFileName(label: string, extension: string): string {
  return `${label.replace(UNSAFE_FILE_NAME_CHARS, '_')}${extension}`;
}
