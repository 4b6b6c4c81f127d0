import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import Database from 'better-sqlite3';
import { mkdirSync, readFileSync } from 'node:fs';
import { dirname } from 'node:path';

import * as schema from './schema';
import { packageResource } from '../fs/package-root';

export type RolodeckDb = BetterSQLite3Database<typeof schema> & {
  $client: Database.Database;
};

function getSchemaFile(): string {
  return packageResource('sql/schema.sql');
}

function configurePragmas(db: RolodeckDb): void {
  const client = db.$client;
  client.pragma('journal_mode = WAL');
  client.pragma('foreign_keys = ON');
  client.pragma('busy_timeout = 5000');
}

/**
 * 새 DB 열기 + pragma + 스키마 적용.
 */
export function createRolodeckDb(path: string): RolodeckDb {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }
  const client = new Database(path);
  const db = drizzle(client, { schema, casing: 'snake_case' });
  configurePragmas(db);
  applySchema(db);
  return db;
}

/**
 * 누락된 테이블/인덱스를 생성한다. 모든 DDL이 `IF NOT EXISTS`이므로 반복 호출해도 안전하다.
 */
export function applySchema(db: RolodeckDb): void {
  db.$client.exec(readFileSync(getSchemaFile(), 'utf-8'));
}

export function closeDb(db: RolodeckDb): void {
  db.$client.close();
}

/**
 * 연결 상태 확인용 `SELECT 1`. 닫힌 연결이면 false.
 */
export function pingDb(db: RolodeckDb): boolean {
  try {
    db.$client.prepare('SELECT 1').get();
    return true;
  } catch {
    return false;
  }
}

/**
 * 트랜잭션 객체를 RolodeckDb로 캐스팅하는 헬퍼.
 * drizzle-orm의 트랜잭션 타입과 RolodeckDb가 정확히 일치하지 않아
 * 캐스팅이 필요한데, 이 함수로 캐스팅을 한 곳에 집중시킨다.
 */
export function txDb(tx: unknown): RolodeckDb {
  return tx as RolodeckDb;
}
