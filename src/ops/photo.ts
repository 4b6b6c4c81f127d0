import type { RolodeckContext } from '../config';
import { CardNotFoundError } from '../card/errors';
import { validatePhotoUpload } from '../card/validation';
import { runInTransaction } from '../db/repos';
import {
  deletePhotoFile,
  discardPhoto,
  readPhotoFile,
  resolvePhotoFile,
  toPhotoPath,
  toPhotoUrl,
  writePhotoFile,
} from '../fs/uploads';
import { deleteCardRow } from './delete';
import { runExclusive, safeWriteOperation, toStorageError } from './safe';

export interface UploadPhotoResult {
  /** DB에 저장된 상대 경로 (e.g. `'uploads/card_3_1760000000000.png'`). */
  photoPath: string;
  /** 공개 URL (`'/' + photoPath`). */
  photoUrl: string;
}

function swapPhotoPath(ctx: RolodeckContext, id: number, photoPath: string): string | null {
  const now = ctx.clock().toISOString();
  return runInTransaction(ctx.db, ({ cardRepo }) => {
    const previous = cardRepo.findPhotoPath(id);
    if (previous === null) return null;
    cardRepo.setPhotoPath(id, photoPath, now);
    return previous;
  });
}

/**
 * 카드의 photoPath를 설정한다 (파일은 다루지 않음).
 * 참조할 파일은 호출 전에 이미 기록되어 있어야 한다.
 *
 * @throws {CardNotFoundError} 해당 id의 카드가 없을 때.
 */
export async function setCardPhoto(
  ctx: RolodeckContext,
  id: number,
  photoPath: string,
): Promise<void> {
  return runExclusive(ctx, () => {
    if (swapPhotoPath(ctx, id, photoPath) === null) {
      throw new CardNotFoundError(id);
    }
  });
}

/**
 * 카드의 photoPath를 읽고 비운다 (파일은 다루지 않음).
 *
 * @returns 이전 photoPath (`''`이면 사진 없음). 카드가 없으면 null.
 */
export async function clearCardPhoto(ctx: RolodeckContext, id: number): Promise<string | null> {
  return runExclusive(ctx, () => swapPhotoPath(ctx, id, ''));
}

/**
 * 사진을 업로드하고 카드에 연결한다.
 *
 * 1. 크기/확장자 검증. 실패 시 아무것도 쓰지 않는다.
 * 2. 카드 존재 확인.
 * 3. `card_<id>_<millis>.<ext>`로 파일을 쓴 뒤에만 DB 참조를 교체한다 (write-before-link).
 * 4. DB 교체가 실패하면 새 파일을 지운다. 그것마저 실패하면 `CompensationError`.
 * 5. 이전 사진 파일은 best-effort로 삭제한다.
 *
 * @param ctx - `setupRolodeck()`으로 생성된 컨텍스트.
 * @param id - 카드 id.
 * @param fileName - 원본 파일명. 확장자 판정에만 쓰인다.
 * @param bytes - 파일 내용.
 * @throws {CardValidationError} 빈 파일, 크기 초과, 허용되지 않는 확장자.
 * @throws {CardNotFoundError} 해당 id의 카드가 없을 때.
 * @throws {CompensationError} DB 실패 후 새 파일 삭제도 실패했을 때.
 */
export async function uploadCardPhoto(
  ctx: RolodeckContext,
  id: number,
  fileName: string,
  bytes: Uint8Array,
): Promise<UploadPhotoResult> {
  const ext = validatePhotoUpload(fileName, bytes.byteLength, ctx.maxPhotoBytes);

  return runExclusive(ctx, async () => {
    if (!ctx.cardRepo.existsById(id)) {
      throw new CardNotFoundError(id);
    }

    let storedName = '';
    const previous = await safeWriteOperation({
      fileAction: async () => {
        storedName = await writePhotoFile(ctx, id, ext, bytes);
      },
      dbAction: () => {
        const prev = swapPhotoPath(ctx, id, toPhotoPath(ctx, storedName));
        if (prev === null) throw new CardNotFoundError(id);
        return prev;
      },
      compensate: async () => {
        await deletePhotoFile(ctx, storedName);
      },
    });

    const photoPath = toPhotoPath(ctx, storedName);
    if (previous && previous !== photoPath) {
      await discardPhoto(ctx, previous);
    }
    return { photoPath, photoUrl: toPhotoUrl(photoPath) };
  });
}

/**
 * 카드의 사진을 제거한다.
 * DB 참조를 먼저 비우고, 그다음 파일을 best-effort로 삭제한다.
 *
 * @returns 이전 photoPath (사진이 없었으면 `''`).
 * @throws {CardNotFoundError} 해당 id의 카드가 없을 때.
 */
export async function deleteCardPhoto(ctx: RolodeckContext, id: number): Promise<string> {
  return runExclusive(ctx, async () => {
    const previous = swapPhotoPath(ctx, id, '');
    if (previous === null) {
      throw new CardNotFoundError(id);
    }
    await discardPhoto(ctx, previous);
    return previous;
  });
}

/**
 * 카드를 삭제하고 참조하던 사진 파일도 best-effort로 지운다.
 *
 * @returns 삭제 전 photoPath.
 * @throws {CardNotFoundError} 해당 id의 카드가 없을 때.
 */
export async function removeCard(
  ctx: RolodeckContext,
  id: number,
): Promise<{ photoPath: string }> {
  return runExclusive(ctx, async () => {
    const result = deleteCardRow(ctx, id);
    await discardPhoto(ctx, result.photoPath);
    return result;
  });
}

/**
 * 공개 경로로 요청된 사진 파일을 읽는다.
 * 업로드 루트 바로 아래의 평면 파일명만 허용한다.
 *
 * @returns 파일 내용. 없으면 null.
 * @throws {CardValidationError} 경로 구분자나 `..`가 포함된 이름.
 * @throws {CardStorageError} 없는 파일 이외의 읽기 실패 (e.g. 디렉토리).
 */
export async function readPhoto(ctx: RolodeckContext, fileName: string): Promise<Buffer | null> {
  try {
    return await readPhotoFile(ctx, fileName);
  } catch (err) {
    throw toStorageError(err);
  }
}

export { resolvePhotoFile };
