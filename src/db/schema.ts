import {
  sqliteTable,
  text,
  integer,
  index,
  primaryKey,
} from 'drizzle-orm/sqlite-core';

/**
 * drizzle 테이블 매핑.
 * 실제 DDL은 `sql/schema.sql`에 있으며 두 정의는 항상 함께 수정한다.
 */
export const cards = sqliteTable(
  'cards',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    name: text('name').notNull(),
    title: text('title').notNull().default(''),
    company: text('company').notNull().default(''),
    website: text('website').notNull().default(''),
    notes: text('notes').notNull().default(''),
    photoPath: text('photo_path').notNull().default(''),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => [index('idx_cards_updated_at').on(table.updatedAt)],
);

export const cardPhones = sqliteTable(
  'card_phones',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    cardId: integer('card_id')
      .notNull()
      .references(() => cards.id, { onDelete: 'cascade' }),
    label: text('label').notNull().default('mobile'),
    number: text('number').notNull(),
  },
  (table) => [index('idx_card_phones_card').on(table.cardId)],
);

export const cardEmails = sqliteTable(
  'card_emails',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    cardId: integer('card_id')
      .notNull()
      .references(() => cards.id, { onDelete: 'cascade' }),
    label: text('label').notNull().default('work'),
    address: text('address').notNull(),
  },
  (table) => [index('idx_card_emails_card').on(table.cardId)],
);

export const cardAddresses = sqliteTable(
  'card_addresses',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    cardId: integer('card_id')
      .notNull()
      .references(() => cards.id, { onDelete: 'cascade' }),
    label: text('label').notNull().default('office'),
    street: text('street').notNull().default(''),
    city: text('city').notNull().default(''),
    country: text('country').notNull().default(''),
    postal: text('postal').notNull().default(''),
  },
  (table) => [index('idx_card_addresses_card').on(table.cardId)],
);

export const tags = sqliteTable('tags', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull().unique(),
});

export const cardTags = sqliteTable(
  'card_tags',
  {
    cardId: integer('card_id')
      .notNull()
      .references(() => cards.id, { onDelete: 'cascade' }),
    tagId: integer('tag_id')
      .notNull()
      .references(() => tags.id, { onDelete: 'cascade' }),
  },
  (table) => [
    primaryKey({ columns: [table.cardId, table.tagId] }),
    index('idx_card_tags_tag').on(table.tagId),
  ],
);
