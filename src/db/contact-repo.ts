import { asc, eq, inArray } from 'drizzle-orm';

import type { RolodeckDb } from './connection';
import type { ContactRepository, ContactRows, ContactSet } from './repository';
import { cardAddresses, cardEmails, cardPhones } from './schema';
import { inBatches } from './batch';

export const DEFAULT_PHONE_LABEL = 'mobile';
export const DEFAULT_EMAIL_LABEL = 'work';
export const DEFAULT_ADDRESS_LABEL = 'office';

export class DrizzleContactRepository implements ContactRepository {
  constructor(private db: RolodeckDb) {}

  replaceForCard(cardId: number, contacts: ContactSet): void {
    // diff 없이 전부 지우고 다시 넣는다. 하위 행 id는 매번 새로 발급된다.
    this.db.delete(cardPhones).where(eq(cardPhones.cardId, cardId)).run();
    this.db.delete(cardEmails).where(eq(cardEmails.cardId, cardId)).run();
    this.db.delete(cardAddresses).where(eq(cardAddresses.cardId, cardId)).run();

    for (const phone of contacts.phones) {
      this.db
        .insert(cardPhones)
        .values({ cardId, label: phone.label ?? DEFAULT_PHONE_LABEL, number: phone.number })
        .run();
    }
    for (const email of contacts.emails) {
      this.db
        .insert(cardEmails)
        .values({ cardId, label: email.label ?? DEFAULT_EMAIL_LABEL, address: email.address })
        .run();
    }
    for (const addr of contacts.addresses) {
      this.db
        .insert(cardAddresses)
        .values({
          cardId,
          label: addr.label ?? DEFAULT_ADDRESS_LABEL,
          street: addr.street ?? '',
          city: addr.city ?? '',
          country: addr.country ?? '',
          postal: addr.postal ?? '',
        })
        .run();
    }
  }

  findByCardIds(cardIds: readonly number[]): ContactRows {
    return {
      phones: inBatches(cardIds, (batch) =>
        this.db
          .select()
          .from(cardPhones)
          .where(inArray(cardPhones.cardId, batch))
          .orderBy(asc(cardPhones.id))
          .all(),
      ),
      emails: inBatches(cardIds, (batch) =>
        this.db
          .select()
          .from(cardEmails)
          .where(inArray(cardEmails.cardId, batch))
          .orderBy(asc(cardEmails.id))
          .all(),
      ),
      addresses: inBatches(cardIds, (batch) =>
        this.db
          .select()
          .from(cardAddresses)
          .where(inArray(cardAddresses.cardId, batch))
          .orderBy(asc(cardAddresses.id))
          .all(),
      ),
    };
  }
}
