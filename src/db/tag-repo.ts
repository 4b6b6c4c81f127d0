import { asc, count, eq, inArray, notExists } from 'drizzle-orm';

import type { RolodeckDb } from './connection';
import type { TagRepository } from './repository';
import type { TagUsage } from '../card/types';
import { normalizeTagNames } from '../card/tag-name';
import { cardTags, tags } from './schema';
import { inBatches } from './batch';

export class DrizzleTagRepository implements TagRepository {
  constructor(private db: RolodeckDb) {}

  syncTags(cardId: number, names: readonly string[]): void {
    this.db.delete(cardTags).where(eq(cardTags.cardId, cardId)).run();

    const unique = normalizeTagNames(names);
    if (unique.length === 0) return;

    for (const name of unique) {
      this.db.insert(tags).values({ name }).onConflictDoNothing().run();
    }

    const rows = inBatches(unique, (batch) =>
      this.db.select({ id: tags.id }).from(tags).where(inArray(tags.name, batch)).all(),
    );

    for (const row of rows) {
      this.db.insert(cardTags).values({ cardId, tagId: row.id }).onConflictDoNothing().run();
    }
  }

  findNamesByCardIds(cardIds: readonly number[]): Map<number, string[]> {
    const rows = inBatches(cardIds, (batch) =>
      this.db
        .select({ cardId: cardTags.cardId, name: tags.name })
        .from(cardTags)
        .innerJoin(tags, eq(cardTags.tagId, tags.id))
        .where(inArray(cardTags.cardId, batch))
        .orderBy(asc(tags.name))
        .all(),
    );

    const byCard = new Map<number, string[]>();
    for (const row of rows) {
      const list = byCard.get(row.cardId);
      if (list) list.push(row.name);
      else byCard.set(row.cardId, [row.name]);
    }
    return byCard;
  }

  listWithCounts(): TagUsage[] {
    return this.db
      .select({ name: tags.name, count: count(cardTags.cardId) })
      .from(tags)
      .leftJoin(cardTags, eq(cardTags.tagId, tags.id))
      .groupBy(tags.id, tags.name)
      .orderBy(asc(tags.name))
      .all();
  }

  deleteUnused(): string[] {
    const linked = this.db
      .select({ tagId: cardTags.tagId })
      .from(cardTags)
      .where(eq(cardTags.tagId, tags.id));
    return this.db
      .delete(tags)
      .where(notExists(linked))
      .returning({ name: tags.name })
      .all()
      .map((r) => r.name)
      .sort();
  }
}
