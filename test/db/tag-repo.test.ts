import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { createRolodeckDb, closeDb, type RolodeckDb } from '../../src/db/connection';
import { DrizzleCardRepository } from '../../src/db/card-repo';
import { DrizzleTagRepository } from '../../src/db/tag-repo';
import { cardTags, tags } from '../../src/db/schema';

// ---- Setup ----

let db: RolodeckDb;
let cardRepo: DrizzleCardRepository;
let repo: DrizzleTagRepository;

beforeEach(() => {
  db = createRolodeckDb(':memory:');
  cardRepo = new DrizzleCardRepository(db);
  repo = new DrizzleTagRepository(db);
});

afterEach(() => {
  closeDb(db);
});

function insertCard(name: string): number {
  return cardRepo.insert({
    name,
    title: '',
    company: '',
    website: '',
    notes: '',
    photoPath: '',
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
  });
}

function tagNames(id: number): string[] {
  return repo.findNamesByCardIds([id]).get(id) ?? [];
}

// ---- Tests ----

describe('DrizzleTagRepository', () => {
  // HP
  it('should create missing tags and link them sorted by name', () => {
    // Arrange
    const id = insertCard('Alpha');
    // Act
    repo.syncTags(id, ['vip', 'client', 'Partner']);
    // Assert: binary collation puts uppercase first
    expect(tagNames(id)).toEqual(['Partner', 'client', 'vip']);
  });

  it('should reuse an existing tag row instead of creating a duplicate', () => {
    // Arrange
    const a = insertCard('Alpha');
    const b = insertCard('Beta');
    repo.syncTags(a, ['shared']);
    // Act
    repo.syncTags(b, ['shared']);
    // Assert
    expect(db.select().from(tags).all()).toHaveLength(1);
    expect(repo.listWithCounts()).toEqual([{ name: 'shared', count: 2 }]);
  });

  it('should link a repeated name only once', () => {
    // Arrange
    const id = insertCard('Alpha');
    // Act
    repo.syncTags(id, ['vip', 'vip', ' vip ']);
    // Assert
    expect(tagNames(id)).toEqual(['vip']);
    expect(db.select().from(cardTags).all()).toHaveLength(1);
  });

  it('should ignore blank names', () => {
    // Arrange
    const id = insertCard('Alpha');
    // Act
    repo.syncTags(id, ['', '   ', 'ok']);
    // Assert
    expect(tagNames(id)).toEqual(['ok']);
    expect(repo.listWithCounts().map((t) => t.name)).toEqual(['ok']);
  });

  it('should treat names case-sensitively', () => {
    // Arrange
    const id = insertCard('Alpha');
    // Act
    repo.syncTags(id, ['VIP', 'vip']);
    // Assert
    expect(tagNames(id)).toEqual(['VIP', 'vip']);
  });

  it('should replace links and keep tags that drop to zero', () => {
    // Arrange
    const id = insertCard('Alpha');
    repo.syncTags(id, ['old', 'kept']);
    // Act
    repo.syncTags(id, ['kept', 'new']);
    // Assert
    expect(tagNames(id)).toEqual(['kept', 'new']);
    expect(repo.listWithCounts()).toEqual([
      { name: 'kept', count: 1 },
      { name: 'new', count: 1 },
      { name: 'old', count: 0 },
    ]);
  });

  it('should unlink everything when synced with an empty list', () => {
    // Arrange
    const id = insertCard('Alpha');
    repo.syncTags(id, ['a', 'b']);
    // Act
    repo.syncTags(id, []);
    // Assert
    expect(repo.findNamesByCardIds([id]).has(id)).toBe(false);
  });

  it('should drop links but keep tags when the card is deleted', () => {
    // Arrange
    const id = insertCard('Alpha');
    repo.syncTags(id, ['vip']);
    // Act
    cardRepo.deleteById(id);
    // Assert
    expect(db.select().from(cardTags).all()).toEqual([]);
    expect(repo.listWithCounts()).toEqual([{ name: 'vip', count: 0 }]);
  });

  it('should group tag names per card', () => {
    // Arrange
    const a = insertCard('Alpha');
    const b = insertCard('Beta');
    repo.syncTags(a, ['x', 'y']);
    repo.syncTags(b, ['y']);
    // Act
    const byCard = repo.findNamesByCardIds([a, b]);
    // Assert
    expect(byCard.get(a)).toEqual(['x', 'y']);
    expect(byCard.get(b)).toEqual(['y']);
  });

  // GC
  it('should delete exactly the unused tags and return their names sorted', () => {
    // Arrange
    const id = insertCard('Alpha');
    repo.syncTags(id, ['zeta', 'beta', 'used']);
    repo.syncTags(id, ['used']);
    // Act
    const removed = repo.deleteUnused();
    // Assert
    expect(removed).toEqual(['beta', 'zeta']);
    expect(repo.listWithCounts()).toEqual([{ name: 'used', count: 1 }]);
  });

  it('should return an empty list when no tag is unused', () => {
    // Arrange
    const id = insertCard('Alpha');
    repo.syncTags(id, ['used']);
    // Act / Assert
    expect(repo.deleteUnused()).toEqual([]);
  });
});
