import { describe, it, expect, beforeEach } from 'vitest';
import { TopicAccumulator } from '../topic-accumulator.js';

describe('TopicAccumulator', () => {
  let accumulator: TopicAccumulator;

  beforeEach(() => {
    accumulator = new TopicAccumulator({ extension: '.md' });
  });

  it('最初のfoldでバッファを作る', () => {
    const folded = accumulator.fold('2023-01-15', { label: 'Travel', body: 'Went to Kyoto.', order: 0 });

    expect(folded).toBe(true);
    expect(accumulator.get('Travel')).toEqual({
      label: 'Travel',
      labels: ['Travel'],
      fileName: 'Travel.md',
      entries: [{ date: '2023-01-15', body: 'Went to Kyoto.' }],
    });
  });

  it('本文が空のセクションはfoldしない', () => {
    expect(accumulator.fold('2023-01-15', { label: 'Empty', body: '', order: 0 })).toBe(false);
    expect(accumulator.fold('2023-01-15', { label: 'Blank', body: '  \n ', order: 1 })).toBe(false);

    expect(accumulator.get('Empty')).toBeUndefined();
    expect(accumulator.size).toBe(0);
  });

  it('日付ごとにエントリを追加する', () => {
    accumulator.fold('2023-01-15', { label: 'Travel', body: 'Kyoto', order: 0 });
    accumulator.fold('2023-01-16', { label: 'Travel', body: 'Osaka', order: 0 });

    expect(accumulator.get('Travel')?.entries).toEqual([
      { date: '2023-01-15', body: 'Kyoto' },
      { date: '2023-01-16', body: 'Osaka' },
    ]);
  });

  it('同じ日付の重複見出しは1つのエントリにまとめる', () => {
    accumulator.fold('2023-01-15', { label: 'Travel', body: 'morning', order: 0 });
    accumulator.fold('2023-01-15', { label: 'Work', body: 'meeting', order: 1 });
    accumulator.fold('2023-01-15', { label: 'Travel', body: 'evening', order: 2 });

    expect(accumulator.get('Travel')?.entries).toEqual([
      { date: '2023-01-15', body: 'morning\n\nevening' },
    ]);
  });

  it('バッファは最初にfoldした順に並ぶ', () => {
    accumulator.fold('2023-01-15', { label: 'B', body: 'b', order: 0 });
    accumulator.fold('2023-01-15', { label: 'A', body: 'a', order: 1 });
    accumulator.fold('2023-01-16', { label: 'B', body: 'b2', order: 0 });

    expect(accumulator.buffers().map((buffer) => buffer.label)).toEqual(['B', 'A']);
  });

  it('ファイル名に使えない文字を置き換える', () => {
    accumulator.fold('2023-01-15', { label: '見出し 2?*', body: 'x', order: 0 });

    expect(accumulator.get('見出し 2?*')?.fileName).toBe('見出し 2__.md');
  });

  it('ファイル名が同じになる見出しは1つのバッファにまとめる', () => {
    accumulator.fold('2023-01-15', { label: 'a/b', body: 'first', order: 0 });
    accumulator.fold('2023-01-15', { label: 'a_b', body: 'second', order: 1 });
    accumulator.fold('2023-01-16', { label: 'a_b', body: 'third', order: 0 });

    expect(accumulator.size).toBe(1);
    expect(accumulator.get('a_b')).toEqual({
      label: 'a/b',
      labels: ['a/b', 'a_b'],
      fileName: 'a_b.md',
      entries: [
        { date: '2023-01-15', body: 'first\n\nsecond' },
        { date: '2023-01-16', body: 'third' },
      ],
    });
  });
});
