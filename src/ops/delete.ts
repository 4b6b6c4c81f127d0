import type { RolodeckContext } from '../config';
import { CardNotFoundError } from '../card/errors';
import { runInTransaction } from '../db/repos';
import { runExclusive } from './safe';

/**
 * 카드를 삭제한다 (DB만).
 *
 * FK CASCADE로 phones/emails/addresses와 태그 링크가 함께 삭제된다.
 * 참조하던 사진 파일은 지우지 않는다. 반환된 `photoPath`로 호출자가 정리한다.
 * 파일까지 함께 지우려면 `removeCard`를 쓴다.
 *
 * @param ctx - `setupRolodeck()`으로 생성된 컨텍스트.
 * @param id - 삭제할 카드 id.
 * @returns 삭제 전 photoPath (사진이 없었으면 `''`).
 * @throws {CardNotFoundError} 해당 id의 카드가 없을 때.
 */
export async function deleteCard(
  ctx: RolodeckContext,
  id: number,
): Promise<{ photoPath: string }> {
  return runExclusive(ctx, () => deleteCardRow(ctx, id));
}

/** 잠금 없이 실행되는 본체. 이미 잠금을 잡은 연산에서 재사용한다. */
export function deleteCardRow(ctx: RolodeckContext, id: number): { photoPath: string } {
  return runInTransaction(ctx.db, ({ cardRepo }) => {
    const photoPath = cardRepo.findPhotoPath(id);
    if (photoPath === null) {
      throw new CardNotFoundError(id);
    }
    cardRepo.deleteById(id);
    return { photoPath };
  });
}
