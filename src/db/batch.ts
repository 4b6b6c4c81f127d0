/**
 * SQLite 바인딩 변수 한도를 넘지 않도록 `IN (...)` 조회를 나눠 실행한다.
 */
export const MAX_IN_PARAMS = 500;

export function inBatches<K, T>(keys: readonly K[], fetch: (batch: K[]) => T[]): T[] {
  const out: T[] = [];
  for (let i = 0; i < keys.length; i += MAX_IN_PARAMS) {
    out.push(...fetch(keys.slice(i, i + MAX_IN_PARAMS)));
  }
  return out;
}
