import { readFileSync } from 'node:fs';
import { z } from 'zod';

import type { RolodeckContext } from '../config';
import { CardValidationError } from '../card/errors';
import { cardInputSchema, type NormalizedCardInput } from '../card/validation';
import { runInTransaction } from '../db/repos';
import { packageResource } from '../fs/package-root';
import { insertCardAggregate } from './create';
import { runExclusive } from './safe';

const seedFileSchema = z.array(cardInputSchema);

/**
 * 샘플 카드 JSON 파일을 읽고 검증한다.
 *
 * @param filePath - 기본값: 패키지의 `data/seed.json`.
 * @throws {CardValidationError} 항목 중 하나라도 카드 입력 스키마를 통과하지 못할 때.
 */
export function loadSeedCards(filePath = packageResource('data/seed.json')): NormalizedCardInput[] {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
  const result = seedFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join('.') : 'seed';
    throw new CardValidationError(`seed ${where}: ${issue?.message ?? 'invalid'}`);
  }
  return result.data;
}

/**
 * 저장소가 비어 있을 때만 샘플 카드를 삽입한다.
 * 모든 카드는 하나의 트랜잭션으로 삽입되며, 목록 순서대로 id가 발급된다.
 *
 * @param ctx - `setupRolodeck()`으로 생성된 컨텍스트.
 * @param cards - 삽입할 카드. 생략하면 `data/seed.json`.
 * @returns 삽입한 카드 수. 이미 카드가 있으면 0.
 */
export async function seedSampleCards(
  ctx: RolodeckContext,
  cards?: NormalizedCardInput[],
): Promise<number> {
  const entries = cards ?? loadSeedCards();

  return runExclusive(ctx, () => {
    const now = ctx.clock().toISOString();
    return runInTransaction(ctx.db, (repos) => {
      if (repos.cardRepo.count() > 0) return 0;
      for (const data of entries) {
        insertCardAggregate(repos, data, now);
      }
      return entries.length;
    });
  });
}
