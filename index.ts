// ---- Setup ----
export { setupRolodeck, teardownRolodeck } from './src/setup';
export type { RolodeckOptions, RolodeckContext, PhotoExtension } from './src/config';
export {
  PHOTO_EXTENSIONS,
  DEFAULT_MAX_PHOTO_BYTES,
  DEFAULT_UPLOADS_URL_PREFIX,
} from './src/config';
export {
  loadConfig,
  loadConfigFromPath,
  mergeCliArgs,
  mergeEnv,
  buildDefaultConfig,
  type RolodeckFileConfig,
  type ConfigError,
} from './src/config-file';

// ---- Types ----
export type {
  Card,
  CardInput,
  CardListFilter,
  Phone,
  PhoneInput,
  Email,
  EmailInput,
  Address,
  AddressInput,
  TagUsage,
} from './src/card/types';
export {
  CardValidationError,
  CardNotFoundError,
  CardStorageError,
  CompensationError,
} from './src/card/errors';
export { parseCardInput, validatePhotoUpload, type NormalizedCardInput } from './src/card/validation';
export { normalizeTagNames } from './src/card/tag-name';

// ---- Operations ----
export { createCard } from './src/ops/create';
export { updateCard } from './src/ops/update';
export { deleteCard } from './src/ops/delete';
export {
  getCard,
  listCards,
  hydrateCards,
  listTags,
  isStoreEmpty,
  checkHealth,
  type HealthStatus,
} from './src/ops/query';
export {
  setCardPhoto,
  clearCardPhoto,
  uploadCardPhoto,
  deleteCardPhoto,
  removeCard,
  readPhoto,
  resolvePhotoFile,
  type UploadPhotoResult,
} from './src/ops/photo';
export {
  pruneUnusedTags,
  findOrphanUploads,
  reconcileUploads,
  type ReconcileOptions,
} from './src/ops/maintenance';
export { seedSampleCards, loadSeedCards } from './src/ops/seed';

// ---- Repository interfaces (테스트/목킹용) ----
export type {
  CardRepository,
  ContactRepository,
  TagRepository,
  SearchRepository,
  CardRow,
} from './src/db/repository';

// ---- DB (CLI 통합용) ----
export { createRolodeckDb, applySchema, type RolodeckDb } from './src/db/connection';

// ---- MCP ----
export { registerRolodeckTools } from './src/mcp/tools';

// ---- Safe operations (concurrency / rollback) ----
export {
  withRetry,
  withStoreLock,
  safeWriteOperation,
  type RetryOptions,
  type SafeWriteOptions,
} from './src/ops/safe';
