import { resolve } from 'node:path';

import { createRolodeckDb, closeDb } from './db/connection';
import { createRepositories } from './db/repos';
import {
  DEFAULT_MAX_PHOTO_BYTES,
  DEFAULT_UPLOADS_URL_PREFIX,
  type RolodeckContext,
  type RolodeckOptions,
} from './config';

/**
 * rolodeck 컨텍스트를 초기화한다.
 *
 * 1. SQLite DB를 열고 pragma(WAL, foreign_keys, busy_timeout)와 스키마를 적용한다.
 * 2. Repository 인스턴스를 생성한다.
 *
 * 업로드 디렉토리는 여기서 만들지 않는다. 첫 업로드 시 생성된다.
 *
 * @param options - 초기화 옵션.
 * @returns 초기화된 `RolodeckContext`.
 */
export function setupRolodeck(options: RolodeckOptions): RolodeckContext {
  const db = createRolodeckDb(options.dbPath);
  const prefix = (options.uploadsUrlPrefix ?? DEFAULT_UPLOADS_URL_PREFIX).replace(/^\/+|\/+$/g, '');

  return {
    db,
    ...createRepositories(db),
    uploadsDir: resolve(options.uploadsDir),
    uploadsUrlPrefix: prefix || DEFAULT_UPLOADS_URL_PREFIX,
    maxPhotoBytes: options.maxPhotoBytes ?? DEFAULT_MAX_PHOTO_BYTES,
    clock: options.clock ?? (() => new Date()),
  };
}

/**
 * SQLite 연결을 닫는다.
 * 프로세스 종료 전 또는 컨텍스트를 재생성할 때 호출해야 한다.
 */
export function teardownRolodeck(ctx: RolodeckContext): void {
  closeDb(ctx.db);
}
