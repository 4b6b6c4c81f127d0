/**
 * 태그 이름 목록을 저장 가능한 형태로 정리한다.
 *
 * - 앞뒤 공백을 제거한다.
 * - 빈 항목은 버린다.
 * - 중복은 처음 등장한 순서대로 하나만 남긴다 (대소문자 구분).
 */
export function normalizeTagNames(names: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const raw of names) {
    const name = raw.trim();
    if (name.length === 0) continue;
    seen.add(name);
  }
  return [...seen];
}
