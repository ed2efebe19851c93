/**
 * 最大 `size` 件ずつ並行に処理する
 * 結果は入力と同じ順に並ぶ
 */
export async function mapInBatches<T, R>(
  items: readonly T[],
  size: number,
  fn: (item: T) => Promise<R>
): Promise<R[]> {
  const results: R[] = [];
  const batchSize = Math.max(1, Math.floor(size));

  for (let i = 0; i < items.length; i += batchSize) {
    const batch = items.slice(i, i + batchSize);
    results.push(...(await Promise.all(batch.map(fn))));
  }

  return results;
}
