/**
 * rolodeck 설정 파일 로더.
 *
 * `.rolodeck.jsonc` 또는 `.rolodeck.json`을 탐색하여 로드한다.
 * `jsonc-parser`로 주석 포함 JSONC를 파싱하고,
 * zod 스키마로 엄격하게 검증한 뒤 `Result`로 반환한다.
 *
 * @example
 * ```ts
 * const result = await loadConfig();
 * if (isErr(result)) {
 *   console.error(result.data);
 *   process.exit(1);
 * }
 * const ctx = setupRolodeck(result);
 * ```
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { err } from '@zipbul/result';
import type { Result, Err } from '@zipbul/result';
import { parse, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { z } from 'zod';

import { DEFAULT_MAX_PHOTO_BYTES, DEFAULT_UPLOADS_URL_PREFIX } from './config';

// ── Types ──

/** 설정 파일에서 읽은 전체 구성. 경로는 모두 절대 경로. */
export interface RolodeckFileConfig {
  dbPath: string;
  uploadsDir: string;
  uploadsUrlPrefix: string;
  maxPhotoBytes: number;
}

/** config 에러 데이터 */
export interface ConfigError {
  code: 'FILE_NOT_FOUND' | 'PARSE_ERROR' | 'VALIDATION_ERROR';
  message: string;
  filePath?: string;
}

// ── Defaults ──

export const DEFAULT_DB_PATH = '.rolodeck/data.db';
export const DEFAULT_UPLOADS_DIR = '.rolodeck/uploads';

/** SQLite 인메모리 DB 경로. 경로 해석 없이 그대로 전달된다. */
const MEMORY_DB_PATH = ':memory:';

const CONFIG_FILE_NAMES = ['.rolodeck.jsonc', '.rolodeck.json'] as const;

const fileConfigSchema = z
  .object({
    dbPath: z.string().min(1, '비어있을 수 없습니다').optional(),
    uploadsDir: z.string().min(1, '비어있을 수 없습니다').optional(),
    uploadsUrlPrefix: z
      .string()
      .regex(/^[A-Za-z0-9._-]+(\/[A-Za-z0-9._-]+)*$/, '슬래시로 구분된 경로 조각이어야 합니다')
      .optional(),
    maxPhotoBytes: z.number().int('양의 정수여야 합니다').positive('양의 정수여야 합니다').optional(),
  })
  .strict();

function fail(code: ConfigError['code'], message: string, filePath: string): Err<ConfigError> {
  return err({ code, message, filePath });
}

function resolveDbPath(baseDir: string, dbPath: string): string {
  return dbPath === MEMORY_DB_PATH ? dbPath : resolve(baseDir, dbPath);
}

// ── Core ──

/**
 * 원시 파싱 결과를 검증하고 `RolodeckFileConfig`로 변환한다.
 * 알 수 없는 키와 타입 오류를 모두 모아 한 번에 보고한다.
 * 상대 경로는 설정 파일이 있는 디렉토리 기준으로 해석한다.
 */
export function validateRawConfig(
  raw: unknown,
  filePath: string,
): Result<RolodeckFileConfig, ConfigError> {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    return fail('VALIDATION_ERROR', '설정 파일의 최상위는 객체여야 합니다', filePath);
  }

  const result = fileConfigSchema.safeParse(raw);
  if (!result.success) {
    const messages = result.error.issues.map((issue) => {
      if (issue.code === 'unrecognized_keys') {
        return issue.keys.map((key) => `알 수 없는 키: "${key}"`).join('\n');
      }
      return `"${issue.path.join('.')}": ${issue.message}`;
    });
    return fail('VALIDATION_ERROR', messages.join('\n'), filePath);
  }

  const baseDir = dirname(filePath);
  const data = result.data;
  return {
    dbPath: resolveDbPath(baseDir, data.dbPath ?? DEFAULT_DB_PATH),
    uploadsDir: resolve(baseDir, data.uploadsDir ?? DEFAULT_UPLOADS_DIR),
    uploadsUrlPrefix: data.uploadsUrlPrefix ?? DEFAULT_UPLOADS_URL_PREFIX,
    maxPhotoBytes: data.maxPhotoBytes ?? DEFAULT_MAX_PHOTO_BYTES,
  };
}

/**
 * 지정된 경로에서 설정 파일을 읽고 파싱+검증한다.
 */
export async function loadConfigFromPath(
  filePath: string,
): Promise<Result<RolodeckFileConfig, ConfigError>> {
  const absPath = resolve(filePath);
  if (!existsSync(absPath)) {
    return fail('FILE_NOT_FOUND', `설정 파일을 찾을 수 없습니다: ${absPath}`, absPath);
  }

  let text: string;
  try {
    text = await readFile(absPath, 'utf-8');
  } catch (e) {
    return fail(
      'PARSE_ERROR',
      `설정 파일 읽기 실패: ${e instanceof Error ? e.message : String(e)}`,
      absPath,
    );
  }

  const errors: ParseError[] = [];
  const parsed: unknown = parse(text, errors, { allowTrailingComma: true });
  const first = errors[0];
  if (first) {
    return fail(
      'PARSE_ERROR',
      `JSONC 파싱 실패: ${printParseErrorCode(first.error)} (offset ${first.offset})`,
      absPath,
    );
  }

  return validateRawConfig(parsed, absPath);
}

/**
 * CWD에서 `.rolodeck.jsonc` 또는 `.rolodeck.json`을 자동 탐색한다.
 * 찾으면 로드+검증, 없으면 기본값으로 config를 생성한다.
 *
 * @param cwd - 탐색 시작 디렉토리. 기본값: `process.cwd()`
 */
export async function loadConfig(
  cwd?: string,
): Promise<Result<RolodeckFileConfig, ConfigError>> {
  const baseDir = cwd ?? process.cwd();

  for (const name of CONFIG_FILE_NAMES) {
    const candidate = resolve(baseDir, name);
    if (existsSync(candidate)) {
      return loadConfigFromPath(candidate);
    }
  }

  return buildDefaultConfig(baseDir);
}

/**
 * 환경 변수(`ROLODECK_DB`, `ROLODECK_UPLOADS`)로 config를 override한다.
 * 빈 값은 무시한다. `:memory:`는 경로로 해석하지 않는다.
 */
export function mergeEnv(
  config: RolodeckFileConfig,
  env: Record<string, string | undefined> = process.env,
): RolodeckFileConfig {
  const db = env['ROLODECK_DB'];
  const uploads = env['ROLODECK_UPLOADS'];
  return {
    ...config,
    ...(db ? { dbPath: resolveDbPath(process.cwd(), db) } : {}),
    ...(uploads ? { uploadsDir: resolve(uploads) } : {}),
  };
}

/**
 * CLI arg로 config를 override한다.
 * undefined인 arg는 무시한다.
 */
export function mergeCliArgs(
  config: RolodeckFileConfig,
  args: {
    dbPath?: string;
    uploadsDir?: string;
  },
): RolodeckFileConfig {
  return {
    ...config,
    ...(args.dbPath !== undefined ? { dbPath: resolveDbPath(process.cwd(), args.dbPath) } : {}),
    ...(args.uploadsDir !== undefined ? { uploadsDir: resolve(args.uploadsDir) } : {}),
  };
}

/**
 * 기본값만으로 config 생성. 설정 파일이 없을 때 사용.
 */
export function buildDefaultConfig(baseDir: string): RolodeckFileConfig {
  return {
    dbPath: resolve(baseDir, DEFAULT_DB_PATH),
    uploadsDir: resolve(baseDir, DEFAULT_UPLOADS_DIR),
    uploadsUrlPrefix: DEFAULT_UPLOADS_URL_PREFIX,
    maxPhotoBytes: DEFAULT_MAX_PHOTO_BYTES,
  };
}
