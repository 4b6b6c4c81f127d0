import type { RolodeckContext } from '../config';
import type { CardInput } from '../card/types';
import { CardNotFoundError } from '../card/errors';
import { parseCardInput } from '../card/validation';
import { runInTransaction } from '../db/repos';
import { runExclusive } from './safe';

/**
 * 기존 카드를 전체 교체한다.
 *
 * - 스칼라 필드를 덮어쓰고 `updatedAt`을 갱신한다.
 * - phones/emails/addresses는 전부 삭제 후 다시 삽입한다. 이전 하위 id는 남지 않는다.
 * - 태그 링크를 다시 계산한다. 더 이상 쓰이지 않는 태그 행은 유지된다.
 * - 사진 참조는 건드리지 않는다.
 *
 * @param ctx - `setupRolodeck()`으로 생성된 컨텍스트.
 * @param id - 업데이트할 카드 id.
 * @param input - 새 카드 데이터 (전체).
 * @throws {CardValidationError} 입력이 유효하지 않을 때.
 * @throws {CardNotFoundError} 해당 id의 카드가 없을 때.
 */
export async function updateCard(
  ctx: RolodeckContext,
  id: number,
  input: CardInput,
): Promise<void> {
  const data = parseCardInput(input);

  return runExclusive(ctx, () => {
    const now = ctx.clock().toISOString();
    runInTransaction(ctx.db, ({ cardRepo, contactRepo, tagRepo }) => {
      const updated = cardRepo.updateFields(
        id,
        {
          name: data.name,
          title: data.title,
          company: data.company,
          website: data.website,
          notes: data.notes,
        },
        now,
      );
      if (!updated) {
        throw new CardNotFoundError(id);
      }
      contactRepo.replaceForCard(id, data);
      tagRepo.syncTags(id, data.tags);
    });
  });
}
