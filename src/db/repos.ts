import type { RolodeckDb } from './connection';
import type { CardRepository, ContactRepository, SearchRepository, TagRepository } from './repository';
import { txDb } from './connection';
import { DrizzleCardRepository } from './card-repo';
import { DrizzleContactRepository } from './contact-repo';
import { DrizzleTagRepository } from './tag-repo';
import { DrizzleSearchRepository } from './search-repo';

export interface Repositories {
  cardRepo: CardRepository;
  contactRepo: ContactRepository;
  tagRepo: TagRepository;
  searchRepo: SearchRepository;
}

export function createRepositories(db: RolodeckDb): Repositories {
  return {
    cardRepo: new DrizzleCardRepository(db),
    contactRepo: new DrizzleContactRepository(db),
    tagRepo: new DrizzleTagRepository(db),
    searchRepo: new DrizzleSearchRepository(db),
  };
}

/**
 * 하나의 트랜잭션 안에서 repository 묶음을 사용한다.
 * `fn`이 throw하면 전체가 롤백되고 에러가 그대로 전파된다.
 */
export function runInTransaction<T>(db: RolodeckDb, fn: (repos: Repositories) => T): T {
  return db.transaction((tx) => fn(createRepositories(txDb(tx))));
}
