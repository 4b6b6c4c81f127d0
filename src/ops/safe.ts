import { setTimeout as sleep } from 'node:timers/promises';

import type { RolodeckContext } from '../config';
import {
  CardNotFoundError,
  CardStorageError,
  CardValidationError,
  CompensationError,
} from '../card/errors';

// ── Types ─────────────────────────────────────────────────────────────────

export interface RetryOptions {
  /** 최대 재시도 횟수. 기본값: 3 */
  maxRetries?: number;
  /** 첫 재시도 대기 시간(ms). 지수 백오프 기준. 기본값: 50 */
  baseDelayMs?: number;
  /** 최대 대기 시간(ms). 기본값: 2000 */
  maxDelayMs?: number;
}

export interface SafeWriteOptions<T> {
  /** 파일시스템 액션. 비동기 실행. DB보다 먼저 실행된다. */
  fileAction: () => Promise<void>;
  /** fileAction 성공 후 실행되는 DB 액션. 동기 실행. */
  dbAction: () => T;
  /** dbAction 실패 시 fileAction을 되돌리는 보상 액션. */
  compensate: () => void | Promise<void>;
}

// ── Internal ──────────────────────────────────────────────────────────────

function isSqliteBusy(err: unknown): boolean {
  return err instanceof Error && err.message.includes('database is locked');
}

const storeLocks = new WeakMap<RolodeckContext, Promise<void>>();

// ── Public API ────────────────────────────────────────────────────────────

/**
 * SQLITE_BUSY 에러 시 지수 백오프로 재시도.
 * Non-busy 에러는 즉시 re-throw.
 */
export async function withRetry<T>(
  fn: () => T | Promise<T>,
  options?: RetryOptions,
): Promise<T> {
  const { maxRetries = 3, baseDelayMs = 50, maxDelayMs = 2000 } = options ?? {};

  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await Promise.resolve(fn());
    } catch (err) {
      if (!isSqliteBusy(err)) {
        throw err;
      }
      lastError = err;
      if (attempt < maxRetries) {
        const delay = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
        await sleep(delay);
      }
    }
  }
  throw lastError;
}

/**
 * 동일 ctx에 대한 모든 호출을 FIFO로 직렬화.
 * 앞선 호출이 실패해도 다음 호출은 진행된다.
 * WeakMap 기반이므로 ctx GC 시 자동 정리.
 */
export async function withStoreLock<T>(
  ctx: RolodeckContext,
  fn: () => T | Promise<T>,
): Promise<T> {
  const prev = storeLocks.get(ctx) ?? Promise.resolve();

  let release: () => void = () => {};
  const current = new Promise<void>((resolve) => {
    release = resolve;
  });
  storeLocks.set(ctx, current);

  await prev;

  try {
    return await Promise.resolve(fn());
  } finally {
    release();
    if (storeLocks.get(ctx) === current) {
      storeLocks.delete(ctx);
    }
  }
}

/**
 * 호출자에게 그대로 전달해야 하는 도메인 에러인지 판정.
 */
export function isDomainError(err: unknown): err is Error {
  return (
    err instanceof CardValidationError ||
    err instanceof CardNotFoundError ||
    err instanceof CardStorageError ||
    err instanceof CompensationError
  );
}

/**
 * 도메인 에러가 아닌 에러(SQLite, fs)를 `CardStorageError`로 감싼다.
 */
export function toStorageError(err: unknown): Error {
  return isDomainError(err) ? err : new CardStorageError(err);
}

/**
 * 동기 저장소 호출을 실행하고 실패를 `CardStorageError`로 변환.
 */
export function guardStorage<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw toStorageError(err);
  }
}

/**
 * 쓰기 연산 공통 래퍼: 저장소 잠금 → BUSY 재시도 → 에러 변환.
 */
export function runExclusive<T>(
  ctx: RolodeckContext,
  fn: () => T | Promise<T>,
  options?: RetryOptions,
): Promise<T> {
  return withStoreLock(ctx, async () => {
    try {
      return await withRetry(fn, options);
    } catch (err) {
      throw toStorageError(err);
    }
  });
}

/**
 * 파일 액션 → DB 액션 순서로 실행 (write-before-link).
 * DB 실패 시 compensate로 파일 작업을 되돌린다.
 * compensate도 실패하면 CompensationError.
 */
export async function safeWriteOperation<T>(
  options: SafeWriteOptions<T>,
): Promise<T> {
  const { fileAction, dbAction, compensate } = options;

  await fileAction();

  try {
    return dbAction();
  } catch (err) {
    try {
      await compensate();
    } catch (compErr) {
      throw new CompensationError(err, compErr);
    }
    throw err;
  }
}
