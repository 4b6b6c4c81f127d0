/**
 * MCP Tool 등록 모듈.
 *
 * rolodeck의 public API를 MCP tool로 노출한다.
 * 외부 MCP 서버가 McpServer 인스턴스를 전달하면, 이 함수가 tool 정의를 일괄 등록한다.
 *
 * @example
 * ```ts
 * import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
 * import { setupRolodeck, registerRolodeckTools } from 'rolodeck';
 *
 * const ctx = setupRolodeck({ dbPath: './cards.db', uploadsDir: './uploads' });
 * const server = new McpServer({ name: 'my-server', version: '1.0.0' });
 * registerRolodeckTools(server, ctx);
 * ```
 */

import { z } from 'zod';

import type { RolodeckContext } from '../config';
import type { CardInput } from '../card/types';
import { CardNotFoundError, CardStorageError, CompensationError } from '../card/errors';
import { createCard } from '../ops/create';
import { updateCard } from '../ops/update';
import { checkHealth, getCard, listCards, listTags } from '../ops/query';
import { deleteCardPhoto, removeCard, uploadCardPhoto } from '../ops/photo';
import { pruneUnusedTags, reconcileUploads } from '../ops/maintenance';

// ---- Helpers ----

function ok(data: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(data, null, 2) }] };
}

function fail(err: unknown) {
  let msg: string;
  if (err instanceof CardStorageError || err instanceof CompensationError) {
    console.error(`[rolodeck] ${err.name}:`, err.cause ?? err);
    msg = 'Internal storage error';
  } else {
    msg = err instanceof Error ? err.message : String(err);
  }
  return { content: [{ type: 'text' as const, text: msg }], isError: true as const };
}

// ---- Shared Schemas ----

const idSchema = z.number().int().describe('카드 id');

const phoneSchema = z.object({ label: z.string().optional(), number: z.string() });
const emailSchema = z.object({ label: z.string().optional(), address: z.string() });
const addressSchema = z.object({
  label: z.string().optional(),
  street: z.string().optional(),
  city: z.string().optional(),
  country: z.string().optional(),
  postal: z.string().optional(),
});

const cardFieldsShape = {
  name: z.string().describe('이름 (필수, 공백만으로는 불가)'),
  title: z.string().optional().describe('직함'),
  company: z.string().optional().describe('회사'),
  website: z.string().optional().describe('웹사이트'),
  notes: z.string().optional().describe('메모'),
  phones: z.array(phoneSchema).optional().describe('전화번호 [{label?, number}]'),
  emails: z.array(emailSchema).optional().describe('이메일 [{label?, address}]'),
  addresses: z.array(addressSchema).optional().describe('주소 [{label?, street?, city?, country?, postal?}]'),
  tags: z.array(z.string()).optional().describe('태그 이름 목록'),
};

// ---- McpServer Type ----

/**
 * McpServer의 registerTool에 필요한 최소 인터페이스.
 * @modelcontextprotocol/sdk를 직접 import하지 않고 구조적 타이핑으로 호환.
 */
interface McpServerLike {
  registerTool(name: string, config: Record<string, unknown>, cb: Function): unknown;
}

// ---- Registration ----

/**
 * McpServer에 rolodeck의 모든 tool을 등록한다.
 *
 * @param server - McpServer 인스턴스 (또는 registerTool을 가진 호환 객체)
 * @param ctx - setupRolodeck()로 생성된 RolodeckContext
 */
export function registerRolodeckTools(server: McpServerLike, ctx: RolodeckContext): void {
  // ── CRUD ──

  server.registerTool(
    'rolodeck_create_card',
    {
      description: '새 명함 카드를 생성한다. name이 필수. 새 카드 id를 반환한다.',
      inputSchema: cardFieldsShape,
    },
    async (args: CardInput) => {
      try {
        const id = await createCard(ctx, args);
        return ok({ id });
      } catch (err) {
        return fail(err);
      }
    },
  );

  server.registerTool(
    'rolodeck_get_card',
    {
      description: 'id로 카드 전체(연락처, 태그, 사진 URL 포함)를 조회한다.',
      inputSchema: { id: idSchema },
    },
    async (args: { id: number }) => {
      try {
        const card = getCard(ctx, args.id);
        if (!card) return fail(new CardNotFoundError(args.id));
        return ok(card);
      } catch (err) {
        return fail(err);
      }
    },
  );

  server.registerTool(
    'rolodeck_update_card',
    {
      description: '카드를 전체 교체한다. 생략된 필드와 목록은 비워진다. 사진은 유지된다.',
      inputSchema: { id: idSchema, ...cardFieldsShape },
    },
    async (args: CardInput & { id: number }) => {
      try {
        const { id, ...input } = args;
        await updateCard(ctx, id, input);
        return ok({ id });
      } catch (err) {
        return fail(err);
      }
    },
  );

  server.registerTool(
    'rolodeck_delete_card',
    {
      description: '카드와 연결된 사진 파일을 삭제한다.',
      inputSchema: { id: idSchema },
    },
    async (args: { id: number }) => {
      try {
        const result = await removeCard(ctx, args.id);
        return ok(result);
      } catch (err) {
        return fail(err);
      }
    },
  );

  // ── Query ──

  server.registerTool(
    'rolodeck_list_cards',
    {
      description: '카드 목록을 최근 수정 순으로 조회한다. q(이름/회사/이메일 부분 일치), tag 필터 선택 가능.',
      inputSchema: {
        q: z.string().optional().describe('검색어 (대소문자 무시)'),
        tag: z.string().optional().describe('태그 이름'),
      },
    },
    async (args: { q?: string; tag?: string }) => {
      try {
        return ok(listCards(ctx, args));
      } catch (err) {
        return fail(err);
      }
    },
  );

  server.registerTool(
    'rolodeck_list_tags',
    {
      description: '모든 태그와 연결된 카드 수를 이름순으로 반환한다.',
      inputSchema: {},
    },
    async () => {
      try {
        return ok(listTags(ctx));
      } catch (err) {
        return fail(err);
      }
    },
  );

  // ── Photo ──

  server.registerTool(
    'rolodeck_upload_photo',
    {
      description: '카드 사진을 업로드한다 (jpg/jpeg/png/webp). 기존 사진은 교체된다.',
      inputSchema: {
        id: idSchema,
        fileName: z.string().describe('원본 파일명 (확장자 판정용)'),
        dataBase64: z.string().describe('base64로 인코딩된 파일 내용'),
      },
    },
    async (args: { id: number; fileName: string; dataBase64: string }) => {
      try {
        const bytes = Buffer.from(args.dataBase64, 'base64');
        const result = await uploadCardPhoto(ctx, args.id, args.fileName, bytes);
        return ok(result);
      } catch (err) {
        return fail(err);
      }
    },
  );

  server.registerTool(
    'rolodeck_delete_photo',
    {
      description: '카드 사진을 제거한다.',
      inputSchema: { id: idSchema },
    },
    async (args: { id: number }) => {
      try {
        const photoPath = await deleteCardPhoto(ctx, args.id);
        return ok({ photoPath });
      } catch (err) {
        return fail(err);
      }
    },
  );

  // ── Maintenance ──

  server.registerTool(
    'rolodeck_prune_tags',
    {
      description: '어떤 카드에도 연결되지 않은 태그를 삭제하고 이름 목록을 반환한다.',
      inputSchema: {},
    },
    async () => {
      try {
        const removed = await pruneUnusedTags(ctx);
        return ok({ removed });
      } catch (err) {
        return fail(err);
      }
    },
  );

  server.registerTool(
    'rolodeck_reconcile_uploads',
    {
      description: '어떤 카드도 참조하지 않는 업로드 파일을 정리한다. dryRun이면 목록만 반환.',
      inputSchema: {
        dryRun: z.boolean().optional().describe('삭제하지 않고 목록만 반환'),
      },
    },
    async (args: { dryRun?: boolean }) => {
      try {
        const files = await reconcileUploads(ctx, args);
        return ok({ files, dryRun: args.dryRun ?? false });
      } catch (err) {
        return fail(err);
      }
    },
  );

  server.registerTool(
    'rolodeck_health',
    {
      description: '프로세스와 DB 연결 상태를 반환한다.',
      inputSchema: {},
    },
    async () => ok(checkHealth(ctx)),
  );
}
