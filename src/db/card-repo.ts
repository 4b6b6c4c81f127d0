import { count, eq, inArray, ne } from 'drizzle-orm';

import type { RolodeckDb } from './connection';
import type { CardFieldsRow, CardRepository, CardRow, NewCardRow } from './repository';
import { cards } from './schema';
import { inBatches } from './batch';

export class DrizzleCardRepository implements CardRepository {
  constructor(private db: RolodeckDb) {}

  insert(row: NewCardRow): number {
    const inserted = this.db.insert(cards).values(row).returning({ id: cards.id }).get();
    if (!inserted) {
      throw new Error('card insert returned no row');
    }
    return inserted.id;
  }

  findById(id: number): CardRow | null {
    const row = this.db.select().from(cards).where(eq(cards.id, id)).get();
    return row ?? null;
  }

  findByIds(ids: readonly number[]): CardRow[] {
    return inBatches(ids, (batch) =>
      this.db.select().from(cards).where(inArray(cards.id, batch)).all(),
    );
  }

  existsById(id: number): boolean {
    const row = this.db.select({ id: cards.id }).from(cards).where(eq(cards.id, id)).get();
    return row !== undefined;
  }

  updateFields(id: number, fields: CardFieldsRow, updatedAt: string): boolean {
    const result = this.db
      .update(cards)
      .set({ ...fields, updatedAt })
      .where(eq(cards.id, id))
      .run();
    return result.changes > 0;
  }

  findPhotoPath(id: number): string | null {
    const row = this.db
      .select({ photoPath: cards.photoPath })
      .from(cards)
      .where(eq(cards.id, id))
      .get();
    return row ? row.photoPath : null;
  }

  setPhotoPath(id: number, photoPath: string, updatedAt: string): boolean {
    const result = this.db
      .update(cards)
      .set({ photoPath, updatedAt })
      .where(eq(cards.id, id))
      .run();
    return result.changes > 0;
  }

  deleteById(id: number): boolean {
    const result = this.db.delete(cards).where(eq(cards.id, id)).run();
    return result.changes > 0;
  }

  listPhotoPaths(): string[] {
    return this.db
      .select({ photoPath: cards.photoPath })
      .from(cards)
      .where(ne(cards.photoPath, ''))
      .all()
      .map((r) => r.photoPath);
  }

  count(): number {
    const row = this.db.select({ n: count() }).from(cards).get();
    return row ? row.n : 0;
  }
}
