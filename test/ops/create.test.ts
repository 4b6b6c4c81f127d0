import { describe, it, expect, afterEach, vi } from 'vitest';

import {
  createCard,
  getCard,
  listTags,
  CardStorageError,
} from '../../index';
import { DrizzleContactRepository } from '../../src/db/contact-repo';
import { createTestContext, type TestContext } from '../helpers';

describe('createCard', () => {
  let tc: TestContext;

  afterEach(async () => {
    vi.restoreAllMocks();
    await tc?.cleanup();
  });

  // ── Happy Path ──

  it('should return id 1 for the first card and store every field', async () => {
    // Arrange
    tc = await createTestContext();
    // Act
    const id = await createCard(tc.ctx, {
      name: 'Ada Example',
      title: 'Engineer',
      company: 'Example Corp',
      website: 'https://example.com',
      notes: 'met at a meetup',
      phones: [{ label: 'work', number: '555-0100' }],
      emails: [{ address: 'ada@example.com' }],
      addresses: [{ street: '1 Main St', city: 'Springfield', country: 'Exampleland', postal: '12345' }],
      tags: ['vip', 'client'],
    });
    // Assert
    expect(id).toBe(1);
    const card = getCard(tc.ctx, id);
    expect(card).toEqual({
      id: 1,
      name: 'Ada Example',
      title: 'Engineer',
      company: 'Example Corp',
      website: 'https://example.com',
      notes: 'met at a meetup',
      photoUrl: '',
      phones: [{ id: 1, label: 'work', number: '555-0100' }],
      emails: [{ id: 1, label: 'work', address: 'ada@example.com' }],
      addresses: [
        {
          id: 1,
          label: 'office',
          street: '1 Main St',
          city: 'Springfield',
          country: 'Exampleland',
          postal: '12345',
        },
      ],
      tags: ['client', 'vip'],
      createdAt: '2026-01-01T00:00:00.000Z',
      updatedAt: '2026-01-01T00:00:00.000Z',
    });
  });

  it('should default every optional field to empty', async () => {
    // Arrange
    tc = await createTestContext();
    // Act
    const id = await createCard(tc.ctx, { name: 'Solo' });
    // Assert
    const card = getCard(tc.ctx, id);
    expect(card?.title).toBe('');
    expect(card?.notes).toBe('');
    expect(card?.phones).toEqual([]);
    expect(card?.emails).toEqual([]);
    expect(card?.addresses).toEqual([]);
    expect(card?.tags).toEqual([]);
  });

  it('should create a new tag only once across cards', async () => {
    // Arrange
    tc = await createTestContext();
    // Act
    await createCard(tc.ctx, { name: 'A', tags: ['vip'] });
    await createCard(tc.ctx, { name: 'B', tags: ['vip', ' vip ', 'new'] });
    // Assert
    expect(listTags(tc.ctx)).toEqual([
      { name: 'new', count: 1 },
      { name: 'vip', count: 2 },
    ]);
  });

  // ── Validation ──

  it('should reject a missing name before touching the store', async () => {
    // Arrange
    tc = await createTestContext();
    // Act & Assert
    await expect(createCard(tc.ctx, { name: '   ' })).rejects.toThrow('name: must not be empty');
    expect(tc.ctx.cardRepo.count()).toBe(0);
  });

  it('should store long notes and many tags without truncation', async () => {
    // Arrange
    tc = await createTestContext();
    const notes = 'n'.repeat(20_000);
    const tags = Array.from({ length: 51 }, (_, i) => `tag${String(i).padStart(2, '0')}`);
    // Act
    const id = await createCard(tc.ctx, { name: 'Prolific', notes, tags });
    // Assert
    const card = getCard(tc.ctx, id);
    expect(card?.notes).toBe(notes);
    expect(card?.tags).toEqual(tags);
  });

  // ── Atomicity ──

  it('should leave no card row when a child insert fails', async () => {
    // Arrange
    tc = await createTestContext();
    vi.spyOn(DrizzleContactRepository.prototype, 'replaceForCard').mockImplementation(() => {
      throw new Error('disk full');
    });
    // Act & Assert
    await expect(
      createCard(tc.ctx, { name: 'Doomed', phones: [{ number: '1' }], tags: ['x'] }),
    ).rejects.toBeInstanceOf(CardStorageError);
    expect(tc.ctx.cardRepo.count()).toBe(0);
    expect(listTags(tc.ctx)).toEqual([]);
  });
});
