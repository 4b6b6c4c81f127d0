import type { RolodeckContext } from '../config';
import type { CardInput } from '../card/types';
import { parseCardInput, type NormalizedCardInput } from '../card/validation';
import { runInTransaction, type Repositories } from '../db/repos';
import { runExclusive } from './safe';

/**
 * 새 카드를 생성한다.
 *
 * 1. 입력을 검증하고 기본값을 채운다 (DB 접근 전).
 * 2. 하나의 트랜잭션에서 카드 행, phones/emails/addresses 행, 태그 링크를 삽입한다.
 *    중간에 실패하면 전체가 롤백되어 하위 행이 빠진 카드가 남지 않는다.
 *
 * @param ctx - `setupRolodeck()`으로 생성된 컨텍스트.
 * @param input - 생성할 카드 데이터.
 * @returns 새 카드 id.
 * @throws {CardValidationError} name이 비었거나 크기 제한을 넘을 때.
 * @throws {CardStorageError} SQLite 오류.
 */
export async function createCard(ctx: RolodeckContext, input: CardInput): Promise<number> {
  const data = parseCardInput(input);

  return runExclusive(ctx, () => {
    const now = ctx.clock().toISOString();
    return runInTransaction(ctx.db, (repos) => insertCardAggregate(repos, data, now));
  });
}

/**
 * 카드 행과 하위 행, 태그 링크를 삽입한다. 호출자의 트랜잭션 안에서 실행되어야 한다.
 */
export function insertCardAggregate(
  { cardRepo, contactRepo, tagRepo }: Repositories,
  data: NormalizedCardInput,
  now: string,
): number {
  const id = cardRepo.insert({
    name: data.name,
    title: data.title,
    company: data.company,
    website: data.website,
    notes: data.notes,
    photoPath: '',
    createdAt: now,
    updatedAt: now,
  });
  contactRepo.replaceForCard(id, data);
  tagRepo.syncTags(id, data.tags);
  return id;
}
