import type { RolodeckContext } from '../config';
import { deletePhotoFile, listStoredPhotoFiles, photoFileNameOf } from '../fs/uploads';
import { runExclusive } from './safe';

export interface ReconcileOptions {
  /** true면 삭제하지 않고 대상 목록만 반환한다. 기본값: false */
  dryRun?: boolean;
}

/**
 * 어떤 카드에도 연결되지 않은 태그를 삭제한다.
 * 동기화(syncTags)는 태그를 지우지 않으므로, 명시적으로 호출할 때만 실행된다.
 *
 * @param ctx - `setupRolodeck()`으로 생성된 컨텍스트.
 * @returns 삭제된 태그 이름 (오름차순).
 */
export async function pruneUnusedTags(ctx: RolodeckContext): Promise<string[]> {
  return runExclusive(ctx, () => ctx.tagRepo.deleteUnused());
}

async function collectOrphans(ctx: RolodeckContext): Promise<string[]> {
  const referenced = new Set<string>();
  for (const photoPath of ctx.cardRepo.listPhotoPaths()) {
    const name = photoFileNameOf(ctx, photoPath);
    if (name) referenced.add(name);
  }
  const stored = await listStoredPhotoFiles(ctx);
  return stored.filter((name) => !referenced.has(name));
}

/**
 * 업로드 루트에서 저장 파일명 형식(`card_<id>_<millis>.<ext>`)을 따르지만
 * 어떤 카드도 참조하지 않는 파일을 찾는다.
 *
 * @returns 파일명 목록 (오름차순).
 */
export async function findOrphanUploads(ctx: RolodeckContext): Promise<string[]> {
  return runExclusive(ctx, () => collectOrphans(ctx));
}

/**
 * 참조되지 않는 업로드 파일을 삭제한다.
 * 형식이 다른 파일은 건드리지 않는다.
 *
 * @param ctx - `setupRolodeck()`으로 생성된 컨텍스트.
 * @param options - `dryRun`이면 목록만 반환.
 * @returns 삭제했거나(dryRun이면 삭제할) 파일명 목록.
 */
export async function reconcileUploads(
  ctx: RolodeckContext,
  options?: ReconcileOptions,
): Promise<string[]> {
  const dryRun = options?.dryRun ?? false;

  return runExclusive(ctx, async () => {
    const orphans = await collectOrphans(ctx);
    if (!dryRun) {
      for (const name of orphans) {
        await deletePhotoFile(ctx, name);
      }
    }
    return orphans;
  });
}
