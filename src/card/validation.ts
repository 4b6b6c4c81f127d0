import { extname } from 'node:path';
import { z, type ZodError } from 'zod';

import { CardValidationError } from './errors';
import { PHOTO_EXTENSIONS, type PhotoExtension } from '../config';

const labelSchema = z.string().optional();
const itemSchema = z.string({ required_error: 'is required' });
const optionalItemSchema = z.string().optional();
const fieldSchema = z.string().default('');

export const phoneInputSchema = z.object({ label: labelSchema, number: itemSchema });
export const emailInputSchema = z.object({ label: labelSchema, address: itemSchema });
export const addressInputSchema = z.object({
  label: labelSchema,
  street: optionalItemSchema,
  city: optionalItemSchema,
  country: optionalItemSchema,
  postal: optionalItemSchema,
});

export const cardInputSchema = z.object({
  name: z
    .string({ required_error: 'is required' })
    .refine((v) => v.trim().length > 0, 'must not be empty'),
  title: fieldSchema,
  company: fieldSchema,
  website: fieldSchema,
  notes: fieldSchema,
  phones: z.array(phoneInputSchema).default([]),
  emails: z.array(emailInputSchema).default([]),
  addresses: z.array(addressInputSchema).default([]),
  tags: z.array(z.string()).default([]),
});

/** 기본값이 채워진 카드 입력. 저장 계층은 이 형태만 받는다. */
export type NormalizedCardInput = z.output<typeof cardInputSchema>;

function describeIssue(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid card input';
  const path = issue.path.length > 0 ? issue.path.join('.') : 'input';
  return `${path}: ${issue.message}`;
}

/**
 * 카드 입력을 검증하고 기본값을 채운다.
 * 위반 시 {@link CardValidationError}를 throw한다. 복수 위반이 있어도 첫 번째만 보고된다.
 *
 * @throws {CardValidationError} 필수 필드 누락, 빈 name, 타입 불일치 시
 */
export function parseCardInput(raw: unknown): NormalizedCardInput {
  const result = cardInputSchema.safeParse(raw);
  if (!result.success) {
    throw new CardValidationError(describeIssue(result.error));
  }
  return result.data;
}

/**
 * 업로드할 사진의 파일명과 크기를 검사하고 정규화된 확장자를 반환한다.
 * 내용은 검사하지 않는다. 확장자만으로 판정한다.
 *
 * @throws {CardValidationError} 빈 파일, 크기 초과, 허용되지 않는 확장자
 */
export function validatePhotoUpload(
  fileName: string,
  byteLength: number,
  maxBytes: number,
): PhotoExtension {
  if (byteLength === 0) {
    throw new CardValidationError('photo: must not be empty');
  }
  if (byteLength > maxBytes) {
    throw new CardValidationError(
      `photo: exceeds maximum size of ${maxBytes} bytes (got ${byteLength})`,
    );
  }

  const ext = extname(fileName).slice(1).toLowerCase();
  const allowed = PHOTO_EXTENSIONS.find((e) => e === ext);
  if (!allowed) {
    throw new CardValidationError(
      `photo: extension "${ext}" is not allowed (allowed: ${PHOTO_EXTENSIONS.join(', ')})`,
    );
  }
  return allowed;
}
