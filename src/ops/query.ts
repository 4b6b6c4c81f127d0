import type { RolodeckContext } from '../config';
import type { Card, CardListFilter, TagUsage } from '../card/types';
import type { CardRow, ContactRows } from '../db/repository';
import { runInTransaction, type Repositories } from '../db/repos';
import { pingDb } from '../db/connection';
import { toPhotoUrl } from '../fs/uploads';
import { guardStorage } from './safe';

function isValidId(id: number): boolean {
  return Number.isSafeInteger(id) && id > 0;
}

function groupByCard<T extends { cardId: number }>(rows: T[]): Map<number, T[]> {
  const grouped = new Map<number, T[]>();
  for (const row of rows) {
    const list = grouped.get(row.cardId);
    if (list) list.push(row);
    else grouped.set(row.cardId, [row]);
  }
  return grouped;
}

function assembleCards(
  ids: number[],
  rows: CardRow[],
  contacts: ContactRows,
  tagNames: Map<number, string[]>,
): Card[] {
  const byId = new Map(rows.map((r) => [r.id, r]));
  const phones = groupByCard(contacts.phones);
  const emails = groupByCard(contacts.emails);
  const addresses = groupByCard(contacts.addresses);

  const cards: Card[] = [];
  for (const id of ids) {
    const row = byId.get(id);
    if (!row) continue;
    cards.push({
      id: row.id,
      name: row.name,
      title: row.title,
      company: row.company,
      website: row.website,
      notes: row.notes,
      photoUrl: toPhotoUrl(row.photoPath),
      phones: (phones.get(id) ?? []).map(({ id, label, number }) => ({ id, label, number })),
      emails: (emails.get(id) ?? []).map(({ id, label, address }) => ({ id, label, address })),
      addresses: (addresses.get(id) ?? []).map(({ id, label, street, city, country, postal }) => ({
        id,
        label,
        street,
        city,
        country,
        postal,
      })),
      tags: tagNames.get(id) ?? [],
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    });
  }
  return cards;
}

function hydrateWith(repos: Repositories, ids: number[]): Card[] {
  const rows = repos.cardRepo.findByIds(ids);
  const found = new Set(rows.map((r) => r.id));
  const present = ids.filter((id) => found.has(id));
  if (present.length === 0) return [];
  return assembleCards(
    present,
    rows,
    repos.contactRepo.findByCardIds(present),
    repos.tagRepo.findNamesByCardIds(present),
  );
}

/**
 * id 목록을 완전한 카드로 적재한다.
 *
 * - 처음 등장한 순서를 유지하고 중복 id는 한 번만 포함한다.
 * - 존재하지 않는 id는 건너뛴다.
 * - 하위 컬렉션은 id별 N+1 조회 대신 `IN (...)` 배치로 읽는다.
 * - 하나의 읽기 트랜잭션에서 실행되므로 부분 적재된 카드를 반환하지 않는다.
 */
export function hydrateCards(ctx: RolodeckContext, ids: readonly number[]): Card[] {
  const unique = [...new Set(ids.filter(isValidId))];
  if (unique.length === 0) return [];
  return guardStorage(() => runInTransaction(ctx.db, (repos) => hydrateWith(repos, unique)));
}

/**
 * 카드 하나를 조회한다.
 *
 * @param ctx - `setupRolodeck()`으로 생성된 컨텍스트.
 * @param id - 조회할 카드 id.
 * @returns 완전히 적재된 카드. 없으면 null (에러 아님).
 */
export function getCard(ctx: RolodeckContext, id: number): Card | null {
  return hydrateCards(ctx, [id])[0] ?? null;
}

/**
 * 검색 조건에 맞는 카드 목록을 조회한다.
 *
 * - `q`: name, company, 연결된 email 주소 중 하나라도 부분 일치 (대소문자 무시).
 * - `tag`: 해당 태그가 연결된 카드만.
 * - 둘 다 주면 교집합, 둘 다 없으면 전체.
 *
 * @returns updatedAt 내림차순 (같으면 id 내림차순).
 */
export function listCards(ctx: RolodeckContext, filter?: CardListFilter): Card[] {
  return guardStorage(() =>
    runInTransaction(ctx.db, (repos) => hydrateWith(repos, repos.searchRepo.findIds(filter))),
  );
}

/**
 * 모든 태그와 연결된 카드 수를 이름 오름차순으로 반환한다. 0개인 태그도 포함된다.
 */
export function listTags(ctx: RolodeckContext): TagUsage[] {
  return guardStorage(() => ctx.tagRepo.listWithCounts());
}

/** 카드가 하나도 없으면 true. */
export function isStoreEmpty(ctx: RolodeckContext): boolean {
  return guardStorage(() => ctx.cardRepo.count() === 0);
}

export interface HealthStatus {
  status: 'ok';
  db: 'ok' | 'error';
}

/**
 * 프로세스 상태와 DB 연결 상태.
 */
export function checkHealth(ctx: RolodeckContext): HealthStatus {
  return { status: 'ok', db: pingDb(ctx.db) ? 'ok' : 'error' };
}
