import type { Section } from '@note-topics/types';
import type { Splitter } from './index.js';

/** 見出し行（レベル1〜6を区別しない） */
const HEADING_PATTERN = /^#{1,6}\s+\S/;

export interface SectionSplitterOptions {
  /** 最初の見出しより前の本文に付けるラベル */
  introductionLabel: string;
}

/**
 * 日次ドキュメントを見出し単位のセクションに分割するクラス
 *
 * 見出しのレベルは捨て、ラベルのみをマージキーとして扱う。
 */
export class SectionSplitter implements Splitter {
  constructor(private options: SectionSplitterOptions) {}

  /**
   * 本文を分割
   * @param rawText ドキュメントの全文
   * @returns 何度でも先頭から列挙できるセクション列
   */
  split(rawText: string): Iterable<Section> {
    const text = normalizeLineEndings(rawText);
    const introductionLabel = this.options.introductionLabel;

    return {
      [Symbol.iterator]: () => iterateSections(text, introductionLabel),
    };
  }
}

function* iterateSections(text: string, introductionLabel: string): Generator<Section> {
  let label = introductionLabel;
  let lines: string[] = [];
  let isIntroduction = true;
  let order = 0;

  for (const line of text.split('\n')) {
    if (!HEADING_PATTERN.test(line)) {
      lines.push(line);
      continue;
    }

    const body = toBody(lines);
    // 暗黙の前文セクションは本文がある場合のみ
    if (!isIntroduction || body) {
      yield { label, body, order: order++ };
    }

    label = parseHeadingLabel(line);
    lines = [];
    isIntroduction = false;
  }

  const body = toBody(lines);
  if (!isIntroduction || body) {
    yield { label, body, order };
  }
}

/**
 * 見出し行からラベルを取り出す
 * 例: "## 旅行 " → "旅行"
 */
export function parseHeadingLabel(line: string): string {
  return line.replace(/^#+/, '').trim();
}

/**
 * 本文の前後の空行を除去
 */
function toBody(lines: string[]): string {
  return lines
    .join('\n')
    .replace(/^(?:[ \t]*\n)+/, '')
    .trimEnd();
}

/**
 * 改行コードをLFに統一
 */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

/**
 * CRLF・LF・CRが混在しているか
 */
export function hasMixedLineEndings(text: string): boolean {
  const styles = [/\r\n/.test(text), /(^|[^\r])\n/.test(text), /\r(?!\n)/.test(text)];
  return styles.filter(Boolean).length > 1;
}
