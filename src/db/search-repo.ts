import { and, desc, sql, type SQL } from 'drizzle-orm';

import type { RolodeckDb } from './connection';
import type { SearchRepository } from './repository';
import type { CardListFilter } from '../card/types';
import { cardEmails, cardTags, cards, tags } from './schema';

/** LIKE 와일드카드(`%`, `_`)와 이스케이프 문자 자체를 리터럴로 취급하도록 이스케이프. */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export class DrizzleSearchRepository implements SearchRepository {
  constructor(private db: RolodeckDb) {}

  findIds(filter?: CardListFilter): number[] {
    // 공백뿐인 q는 없는 것으로 본다. 그 외에는 앞뒤 공백까지 그대로 부분 일치.
    const rawQ = filter?.q ?? '';
    const q = rawQ.trim() ? rawQ : '';
    const tag = filter?.tag?.trim() ?? '';
    const conditions: SQL[] = [];

    if (tag) {
      conditions.push(sql`EXISTS (
        SELECT 1 FROM ${cardTags}
        INNER JOIN ${tags} ON ${tags.id} = ${cardTags.tagId}
        WHERE ${cardTags.cardId} = ${cards.id} AND ${tags.name} = ${tag}
      )`);
    }

    if (q) {
      // SQLite LIKE는 ASCII 범위에서 대소문자를 무시한다.
      const pattern = `%${escapeLike(q)}%`;
      conditions.push(sql`(
        ${cards.name} LIKE ${pattern} ESCAPE '\\'
        OR ${cards.company} LIKE ${pattern} ESCAPE '\\'
        OR EXISTS (
          SELECT 1 FROM ${cardEmails}
          WHERE ${cardEmails.cardId} = ${cards.id} AND ${cardEmails.address} LIKE ${pattern} ESCAPE '\\'
        )
      )`);
    }

    return this.db
      .select({ id: cards.id })
      .from(cards)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(desc(cards.updatedAt), desc(cards.id))
      .all()
      .map((r) => r.id);
  }
}
