import { describe, it, expect, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { readdir } from 'node:fs/promises';

import {
  createCard,
  updateCard,
  deleteCard,
  getCard,
  listCards,
  uploadCardPhoto,
  deleteCardPhoto,
  removeCard,
  findOrphanUploads,
  CardNotFoundError,
} from '../../index';
import { createTestContext, fakeImage, type TestContext } from '../helpers';

function rejectionsOf(results: PromiseSettledResult<unknown>[]): unknown[] {
  return results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));
}

describe('ops concurrency', () => {
  let tc: TestContext;

  afterEach(async () => {
    await tc?.cleanup();
  });

  // ── CR-1: 동시 createCard → 모두 성공, id 중복 없음 ──

  it('[CR] should give distinct ids to concurrent createCard calls', async () => {
    // Arrange
    tc = await createTestContext();
    // Act
    const ids = await Promise.all(
      Array.from({ length: 10 }, (_, i) => createCard(tc.ctx, { name: `Card ${i}` })),
    );
    // Assert
    expect(new Set(ids).size).toBe(10);
    expect(listCards(tc.ctx)).toHaveLength(10);
  });

  // ── CR-2: 같은 카드에 동시 updateCard → 호출 순서대로 적용, 마지막 값 유지 ──

  it('[CR] should apply concurrent updates in call order', async () => {
    // Arrange
    tc = await createTestContext();
    const id = await createCard(tc.ctx, { name: 'Original' });
    // Act
    await Promise.all([
      updateCard(tc.ctx, id, { name: 'Update-A', phones: [{ number: 'a' }] }),
      updateCard(tc.ctx, id, { name: 'Update-B', phones: [{ number: 'b' }] }),
    ]);
    // Assert
    const card = getCard(tc.ctx, id);
    expect(card?.name).toBe('Update-B');
    expect(card?.phones.map((p) => p.number)).toEqual(['b']);
  });

  // ── CR-3: deleteCard + updateCard 같은 카드 → 두 번째 NotFound ──

  it('[CR] should reject the update that follows a concurrent delete', async () => {
    // Arrange
    tc = await createTestContext();
    const id = await createCard(tc.ctx, { name: 'Gone' });
    // Act
    const results = await Promise.allSettled([
      deleteCard(tc.ctx, id),
      updateCard(tc.ctx, id, { name: 'Too late' }),
    ]);
    // Assert
    expect(results[0]?.status).toBe('fulfilled');
    const reasons = rejectionsOf(results);
    expect(reasons).toHaveLength(1);
    expect(reasons[0]).toBeInstanceOf(CardNotFoundError);
  });

  // ── CR-4: 업로드 직후 카드 삭제 → 고아 파일 없음 ──

  it('[CR] should leave no orphan file when a card is removed during an upload', async () => {
    // Arrange
    tc = await createTestContext();
    const id = await createCard(tc.ctx, { name: 'Racer' });
    // Act
    const results = await Promise.allSettled([
      uploadCardPhoto(tc.ctx, id, 'a.png', fakeImage()),
      removeCard(tc.ctx, id),
    ]);
    // Assert
    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'fulfilled']);
    expect(getCard(tc.ctx, id)).toBeNull();
    expect(await findOrphanUploads(tc.ctx)).toEqual([]);
    expect(existsSync(tc.uploadsDir) ? await readdir(tc.uploadsDir) : []).toEqual([]);
  });

  // ── CR-5: 업로드와 사진 삭제 동시 → 호출 순서대로, 파일과 참조 일치 ──

  it('[CR] should keep the file set and reference consistent for upload then photo delete', async () => {
    // Arrange
    tc = await createTestContext();
    const id = await createCard(tc.ctx, { name: 'Flip' });
    // Act
    await Promise.all([
      uploadCardPhoto(tc.ctx, id, 'a.png', fakeImage()),
      deleteCardPhoto(tc.ctx, id),
    ]);
    // Assert
    expect(getCard(tc.ctx, id)?.photoUrl).toBe('');
    expect(await readdir(tc.uploadsDir)).toEqual([]);
  });

  // ── CR-6: 삭제 후 업로드 → NotFound, 파일 없음 ──

  it('[CR] should reject an upload queued behind a delete without writing a file', async () => {
    // Arrange
    tc = await createTestContext();
    const id = await createCard(tc.ctx, { name: 'Late' });
    // Act
    const results = await Promise.allSettled([
      deleteCard(tc.ctx, id),
      uploadCardPhoto(tc.ctx, id, 'a.png', fakeImage()),
    ]);
    // Assert
    const reasons = rejectionsOf(results);
    expect(reasons).toHaveLength(1);
    expect(reasons[0]).toBeInstanceOf(CardNotFoundError);
    expect(existsSync(tc.uploadsDir)).toBe(false);
  });
});
