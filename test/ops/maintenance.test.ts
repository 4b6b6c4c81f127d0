import { describe, it, expect, afterEach } from 'vitest';
import { mkdir, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import {
  createCard,
  updateCard,
  deleteCard,
  listTags,
  uploadCardPhoto,
  pruneUnusedTags,
  findOrphanUploads,
  reconcileUploads,
} from '../../index';
import { createTestContext, fakeImage, type TestContext } from '../helpers';

const T0 = 1767225600000;

describe('pruneUnusedTags', () => {
  let tc: TestContext;

  afterEach(async () => {
    await tc?.cleanup();
  });

  it('should remove exactly the zero-count tags', async () => {
    // Arrange
    tc = await createTestContext();
    const a = await createCard(tc.ctx, { name: 'A', tags: ['keep', 'drop-1'] });
    const b = await createCard(tc.ctx, { name: 'B', tags: ['drop-2'] });
    await updateCard(tc.ctx, a, { name: 'A', tags: ['keep'] });
    await deleteCard(tc.ctx, b);
    // Act
    const removed = await pruneUnusedTags(tc.ctx);
    // Assert
    expect(removed).toEqual(['drop-1', 'drop-2']);
    expect(listTags(tc.ctx)).toEqual([{ name: 'keep', count: 1 }]);
  });

  it('should return an empty list on an empty store', async () => {
    // Arrange
    tc = await createTestContext();
    // Act / Assert
    expect(await pruneUnusedTags(tc.ctx)).toEqual([]);
  });
});

describe('findOrphanUploads / reconcileUploads', () => {
  let tc: TestContext;

  afterEach(async () => {
    await tc?.cleanup();
  });

  async function arrange(): Promise<void> {
    tc = await createTestContext();
    const id = await createCard(tc.ctx, { name: 'A' });
    await uploadCardPhoto(tc.ctx, id, 'a.png', fakeImage());
    await writeFile(join(tc.uploadsDir, 'card_7_123.jpg'), 'orphan');
    await writeFile(join(tc.uploadsDir, 'README.txt'), 'not a photo');
  }

  it('should list stored photos that no card references', async () => {
    // Arrange
    await arrange();
    // Act / Assert
    expect(await findOrphanUploads(tc.ctx)).toEqual(['card_7_123.jpg']);
  });

  it('should only report in dry-run mode', async () => {
    // Arrange
    await arrange();
    // Act
    const files = await reconcileUploads(tc.ctx, { dryRun: true });
    // Assert
    expect(files).toEqual(['card_7_123.jpg']);
    expect((await readdir(tc.uploadsDir)).sort()).toEqual([
      'README.txt',
      `card_1_${T0}.png`,
      'card_7_123.jpg',
    ]);
  });

  it('should remove only unreferenced stored photos', async () => {
    // Arrange
    await arrange();
    // Act
    const files = await reconcileUploads(tc.ctx);
    // Assert
    expect(files).toEqual(['card_7_123.jpg']);
    expect((await readdir(tc.uploadsDir)).sort()).toEqual(['README.txt', `card_1_${T0}.png`]);
  });

  it('should return an empty list when the uploads root does not exist', async () => {
    // Arrange
    tc = await createTestContext();
    // Act / Assert
    expect(await reconcileUploads(tc.ctx)).toEqual([]);
  });

  it('should ignore files under a nested directory', async () => {
    // Arrange
    tc = await createTestContext();
    await mkdir(join(tc.uploadsDir, 'nested'), { recursive: true });
    await writeFile(join(tc.uploadsDir, 'nested', 'card_1_1.png'), 'x');
    // Act / Assert
    expect(await findOrphanUploads(tc.ctx)).toEqual([]);
  });
});
