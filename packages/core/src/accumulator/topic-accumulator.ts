import type { IsoDate, Section, TopicBuffer } from '@note-topics/types';
import { toTopicFileName } from '../writer/file-name.js';

export interface TopicAccumulatorOptions {
  /** 出力ファイルの拡張子 */
  extension: string;
}

/**
 * 複数の日次ドキュメントのセクションを出力ファイルごとに集約するクラス
 *
 * `a/b` と `a_b` のようにファイル名が同じになる見出しは1つのバッファにまとめる。
 * 日付の昇順でfoldされることを前提とする（並べ替えはRunOrchestratorの責務）。
 * インスタンスは1回の実行ごとに作り、実行が終わったら捨てる。
 */
export class TopicAccumulator {
  private topics = new Map<string, TopicBuffer>();

  constructor(private options: TopicAccumulatorOptions) {}

  /**
   * セクションをトピックバッファに追加
   * @returns 追加した場合true（本文が空ならfalse）
   */
  fold(date: IsoDate, section: Section): boolean {
    if (!section.body.trim()) {
      return false;
    }

    const fileName = this.fileNameFor(section.label);
    let buffer = this.topics.get(fileName);
    if (!buffer) {
      buffer = {
        label: section.label,
        labels: [],
        fileName,
        entries: [],
      };
      this.topics.set(fileName, buffer);
    }
    if (!buffer.labels.includes(section.label)) {
      buffer.labels.push(section.label);
    }

    const last = buffer.entries.at(-1);
    if (last && last.date === date) {
      // 同じ日付の寄与は1つの日付見出しにまとめる
      last.body = `${last.body}\n\n${section.body}`;
    } else {
      buffer.entries.push({ date, body: section.body });
    }

    return true;
  }

  /**
   * 見出しラベルが書き出される出力ファイル名
   */
  fileNameFor(label: string): string {
    return toTopicFileName(label, this.options.extension);
  }

  /**
   * 見出しラベルのトピックバッファを取得
   */
  get(label: string): TopicBuffer | undefined {
    return this.topics.get(this.fileNameFor(label));
  }

  /**
   * すべてのトピックバッファ（最初にfoldされた順）
   */
  buffers(): TopicBuffer[] {
    return [...this.topics.values()];
  }

  get size(): number {
    return this.topics.size;
  }
}
