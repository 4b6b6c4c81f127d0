import { resolve, dirname } from 'node:path';
import { existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

/**
 * `from`에서 위로 올라가며 `package.json`을 찾아 패키지 루트를 반환.
 * 찾지 못하면 `from`을 그대로 반환한다.
 */
export function findPackageRoot(from: string): string {
  let dir = resolve(from);
  while (true) {
    if (existsSync(resolve(dir, 'package.json'))) return dir;
    const parent = dirname(dir);
    if (parent === dir) return from;
    dir = parent;
  }
}

/**
 * 패키지 루트 기준 상대 경로를 절대 경로로 변환한다.
 * `sql/schema.sql`, `data/seed.json` 같은 번들 리소스 위치 계산용.
 */
export function packageResource(relativePath: string): string {
  const here = dirname(fileURLToPath(import.meta.url));
  return resolve(findPackageRoot(here), relativePath);
}
