import type { RolodeckDb } from './db/connection';
import type { CardRepository, ContactRepository, SearchRepository, TagRepository } from './db/repository';

/** 업로드 허용 확장자 (소문자, 점 없음). */
export const PHOTO_EXTENSIONS = ['jpg', 'jpeg', 'png', 'webp'] as const;

export type PhotoExtension = (typeof PHOTO_EXTENSIONS)[number];

/** 업로드 최대 크기: 5 MiB */
export const DEFAULT_MAX_PHOTO_BYTES = 5 * 1024 * 1024;

export const DEFAULT_UPLOADS_URL_PREFIX = 'uploads';

export interface RolodeckOptions {
  /** SQLite DB 파일 경로. ':memory:' 허용 */
  dbPath: string;
  /** 사진 파일이 저장되는 디렉토리. 없으면 첫 업로드 시 생성 */
  uploadsDir: string;
  /** 공개 URL 경로 접두사. photoPath = `<prefix>/<file>`, photoUrl = `/<photoPath>`. 기본값: 'uploads' */
  uploadsUrlPrefix?: string;
  /** 업로드 최대 바이트. 기본값: 5 MiB */
  maxPhotoBytes?: number;
  /** createdAt/updatedAt과 업로드 파일명에 쓰이는 시계. 기본값: 현재 시각 */
  clock?: () => Date;
}

export interface RolodeckContext {
  db: RolodeckDb;
  cardRepo: CardRepository;
  contactRepo: ContactRepository;
  tagRepo: TagRepository;
  searchRepo: SearchRepository;
  uploadsDir: string;
  uploadsUrlPrefix: string;
  maxPhotoBytes: number;
  clock: () => Date;
}
