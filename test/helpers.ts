import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { setupRolodeck, teardownRolodeck } from '../src/setup';
import type { RolodeckContext, RolodeckOptions } from '../src/config';

export interface TestClock {
  (): Date;
  /** 시계를 ms만큼 앞으로 이동한다. */
  advance(ms: number): void;
  set(iso: string): void;
}

/**
 * 수동으로 진행하는 시계. 기본 시작 시각은 2026-01-01T00:00:00.000Z.
 */
export function createTestClock(start = '2026-01-01T00:00:00.000Z'): TestClock {
  let now = new Date(start).getTime();
  const clock = () => new Date(now);
  return Object.assign(clock, {
    advance(ms: number) {
      now += ms;
    },
    set(iso: string) {
      now = new Date(iso).getTime();
    },
  });
}

export interface TestContext {
  ctx: RolodeckContext;
  clock: TestClock;
  uploadsDir: string;
  cleanup: () => Promise<void>;
}

/**
 * `:memory:` DB와 임시 업로드 디렉토리를 가진 컨텍스트.
 * 업로드 디렉토리는 첫 업로드 시 생성된다.
 */
export async function createTestContext(
  opts?: Partial<Omit<RolodeckOptions, 'dbPath' | 'uploadsDir' | 'clock'>>,
): Promise<TestContext> {
  const root = await mkdtemp(join(tmpdir(), 'rolodeck-test-'));
  const uploadsDir = join(root, 'uploads');
  const clock = createTestClock();
  const ctx = setupRolodeck({ dbPath: ':memory:', uploadsDir, clock, ...opts });

  return {
    ctx,
    clock,
    uploadsDir,
    cleanup: async () => {
      teardownRolodeck(ctx);
      await rm(root, { recursive: true, force: true });
    },
  };
}

/** 확장자 검사만 통과하면 되는 테스트용 바이트. */
export function fakeImage(size = 16, fill = 0x7f): Uint8Array {
  return new Uint8Array(size).fill(fill);
}
