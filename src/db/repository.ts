import type { AddressInput, CardListFilter, EmailInput, PhoneInput, TagUsage } from '../card/types';

// ---- 행 타입 ----

export interface CardRow {
  id: number;
  name: string;
  title: string;
  company: string;
  website: string;
  notes: string;
  photoPath: string;
  createdAt: string;
  updatedAt: string;
}

export type NewCardRow = Omit<CardRow, 'id'>;

/** `updateFields`가 덮어쓰는 스칼라 필드. */
export type CardFieldsRow = Pick<CardRow, 'name' | 'title' | 'company' | 'website' | 'notes'>;

export interface PhoneRow {
  id: number;
  cardId: number;
  label: string;
  number: string;
}

export interface EmailRow {
  id: number;
  cardId: number;
  label: string;
  address: string;
}

export interface AddressRow {
  id: number;
  cardId: number;
  label: string;
  street: string;
  city: string;
  country: string;
  postal: string;
}

/** 카드가 소유한 하위 컬렉션 입력. */
export interface ContactSet {
  phones: PhoneInput[];
  emails: EmailInput[];
  addresses: AddressInput[];
}

/** 여러 카드의 하위 컬렉션 조회 결과. 각 배열은 id 오름차순. */
export interface ContactRows {
  phones: PhoneRow[];
  emails: EmailRow[];
  addresses: AddressRow[];
}

// ---- Repository 인터페이스 ----

export interface CardRepository {
  /** 새 행을 삽입하고 발급된 id를 반환. */
  insert(row: NewCardRow): number;
  findById(id: number): CardRow | null;
  findByIds(ids: readonly number[]): CardRow[];
  existsById(id: number): boolean;
  /** 스칼라 필드 + updatedAt 갱신. 대상이 없으면 false. */
  updateFields(id: number, fields: CardFieldsRow, updatedAt: string): boolean;
  /** 카드가 없으면 null. 사진이 없으면 `''`. */
  findPhotoPath(id: number): string | null;
  setPhotoPath(id: number, photoPath: string, updatedAt: string): boolean;
  /** FK CASCADE로 하위 행과 태그 링크가 함께 삭제된다. */
  deleteById(id: number): boolean;
  /** 비어 있지 않은 photoPath 전체. */
  listPhotoPaths(): string[];
  count(): number;
}

export interface ContactRepository {
  /** 카드의 phones/emails/addresses를 전부 삭제 후 다시 삽입. 이전 id는 재사용되지 않는다. */
  replaceForCard(cardId: number, contacts: ContactSet): void;
  findByCardIds(cardIds: readonly number[]): ContactRows;
}

export interface TagRepository {
  /** 카드의 태그 링크를 전부 교체. 미등록 태그는 자동 생성, 태그 행은 삭제하지 않는다. */
  syncTags(cardId: number, names: readonly string[]): void;
  /** cardId → 태그 이름(오름차순). */
  findNamesByCardIds(cardIds: readonly number[]): Map<number, string[]>;
  listWithCounts(): TagUsage[];
  /** 연결된 카드가 없는 태그를 삭제하고 그 이름을 반환. */
  deleteUnused(): string[];
}

export interface SearchRepository {
  /** 조건에 맞는 카드 id. updatedAt 내림차순, 같으면 id 내림차순. 중복 없음. */
  findIds(filter?: CardListFilter): number[];
}
