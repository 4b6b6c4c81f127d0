import { mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { RolodeckContext, PhotoExtension } from '../config';
import { CardValidationError } from '../card/errors';

/** 저장 파일명 형식: `card_<id>_<millis>.<ext>` */
export const STORED_PHOTO_PATTERN = /^card_\d+_\d+\.(jpg|jpeg|png|webp)$/i;

const MAX_NAME_ATTEMPTS = 16;

export function buildPhotoFileName(cardId: number, stamp: number, ext: PhotoExtension): string {
  return `card_${cardId}_${stamp}.${ext}`;
}

/** DB에 저장되는 상대 경로: `<prefix>/<file>` */
export function toPhotoPath(ctx: RolodeckContext, fileName: string): string {
  return `${ctx.uploadsUrlPrefix}/${fileName}`;
}

/** `''` → `''`, 그 외 `'/' + photoPath`. */
export function toPhotoUrl(photoPath: string): string {
  return photoPath ? `/${photoPath}` : '';
}

/**
 * 업로드 루트 바로 아래의 평면 파일명만 허용하고 절대 경로를 반환한다.
 *
 * @throws {CardValidationError} 빈 이름, 경로 구분자, `..`, NUL 포함 시
 */
export function resolvePhotoFile(ctx: RolodeckContext, fileName: string): string {
  if (
    fileName.length === 0 ||
    fileName.includes('/') ||
    fileName.includes('\\') ||
    fileName.includes('..') ||
    fileName.includes('\0')
  ) {
    throw new CardValidationError(`photo: invalid file name "${fileName}"`);
  }
  return join(ctx.uploadsDir, fileName);
}

/**
 * photoPath에서 업로드 루트 기준 파일명을 꺼낸다.
 * 접두사가 다르거나 평면 파일명이 아니면 null.
 */
export function photoFileNameOf(ctx: RolodeckContext, photoPath: string): string | null {
  const prefix = `${ctx.uploadsUrlPrefix}/`;
  if (!photoPath.startsWith(prefix)) return null;
  const name = photoPath.slice(prefix.length);
  if (name.length === 0 || name.includes('/') || name.includes('\\') || name.includes('..')) {
    return null;
  }
  return name;
}

/**
 * 사진 바이트를 새 파일로 쓴다. 기존 파일은 절대 덮어쓰지 않는다 (`wx`).
 * 같은 카드가 같은 밀리초에 업로드하면 stamp를 1씩 올려 다시 시도한다.
 *
 * @returns 업로드 루트 기준 파일명.
 */
export async function writePhotoFile(
  ctx: RolodeckContext,
  cardId: number,
  ext: PhotoExtension,
  bytes: Uint8Array,
): Promise<string> {
  await mkdir(ctx.uploadsDir, { recursive: true });

  let stamp = ctx.clock().getTime();
  for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++, stamp++) {
    const fileName = buildPhotoFileName(cardId, stamp, ext);
    try {
      await writeFile(join(ctx.uploadsDir, fileName), bytes, { flag: 'wx' });
      return fileName;
    } catch (err) {
      if (!isAlreadyExists(err)) throw err;
    }
  }
  throw new Error(`could not allocate a unique photo file name for card ${cardId}`);
}

export async function deletePhotoFile(ctx: RolodeckContext, fileName: string): Promise<void> {
  await rm(resolvePhotoFile(ctx, fileName), { force: true });
}

/**
 * 업로드 파일을 best-effort로 삭제한다. DB가 기준이므로 실패는 로그만 남긴다.
 */
export async function discardPhoto(ctx: RolodeckContext, photoPath: string): Promise<void> {
  if (!photoPath) return;
  const fileName = photoFileNameOf(ctx, photoPath);
  if (!fileName) {
    console.warn(`[rolodeck] photo cleanup skipped (outside uploads root): ${photoPath}`);
    return;
  }
  try {
    await deletePhotoFile(ctx, fileName);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.warn(`[rolodeck] photo cleanup failed for ${photoPath}: ${msg}`);
  }
}

/** 파일 내용. 없으면 null. */
export async function readPhotoFile(ctx: RolodeckContext, fileName: string): Promise<Buffer | null> {
  const filePath = resolvePhotoFile(ctx, fileName);
  try {
    return await readFile(filePath);
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

/** 업로드 루트에서 저장 파일명 형식에 맞는 파일 목록. 루트가 없으면 빈 배열. */
export async function listStoredPhotoFiles(ctx: RolodeckContext): Promise<string[]> {
  try {
    const entries = await readdir(ctx.uploadsDir, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && STORED_PHOTO_PATTERN.test(e.name))
      .map((e) => e.name)
      .sort();
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

function isAlreadyExists(err: unknown): boolean {
  return errorCode(err) === 'EEXIST';
}

function isNotFound(err: unknown): boolean {
  return errorCode(err) === 'ENOENT';
}
