#!/usr/bin/env tsx
/**
 * rolodeck CLI 엔트리포인트.
 *
 * 하위 커맨드:
 *   mcp   MCP stdio 서버 실행
 *   seed  저장소가 비어 있으면 샘플 카드 삽입
 *
 * 옵션:
 *   --db-path <path>      SQLite DB 파일 경로
 *   --uploads-dir <path>  사진 업로드 디렉토리
 *   --config <path>       설정 파일 경로 (.rolodeck.jsonc / .json)
 *
 * 우선순위: CLI args > env (ROLODECK_DB, ROLODECK_UPLOADS) > config file > defaults
 *
 * @example
 *   tsx cli.ts mcp --db-path ./data.db --uploads-dir ./uploads
 *   tsx cli.ts mcp --config .rolodeck.jsonc
 *   tsx cli.ts seed  # 자동으로 .rolodeck.jsonc / .json 탐색
 */

import { parseArgs } from 'node:util';
import { isErr } from '@zipbul/result';
import { loadConfig, loadConfigFromPath, mergeCliArgs, mergeEnv } from './src/config-file';
import type { ConfigError, RolodeckFileConfig } from './src/config-file';
import type { Result } from '@zipbul/result';

const VERSION = '0.1.0';

// ── CLI arg 파싱 ──

const { values, positionals } = parseArgs({
  args: process.argv.slice(2),
  options: {
    'db-path': { type: 'string' },
    'uploads-dir': { type: 'string' },
    config: { type: 'string' },
    help: { type: 'boolean', short: 'h' },
    version: { type: 'boolean', short: 'v' },
  },
  allowPositionals: true,
  strict: true,
});

// ── Help / Version ──

function printHelp(): void {
  process.stderr.write(`rolodeck: 명함/연락처 관리

Usage:
  rolodeck <command> [options]

Commands:
  mcp    MCP stdio 서버 실행
  seed   저장소가 비어 있으면 샘플 카드 삽입

Options:
  --db-path <path>      SQLite DB 파일 경로
  --uploads-dir <path>  사진 업로드 디렉토리
  --config <path>       설정 파일 경로
  -h, --help            도움말 출력
  -v, --version         버전 출력

Priority: CLI args > env (ROLODECK_DB, ROLODECK_UPLOADS) > config file > defaults
Config auto-search: .rolodeck.jsonc → .rolodeck.json (CWD)
`);
}

if (values.help) {
  printHelp();
  process.exit(0);
}

if (values.version) {
  process.stderr.write(`rolodeck ${VERSION}\n`);
  process.exit(0);
}

// ── Config ──

async function resolveConfig(): Promise<RolodeckFileConfig> {
  let result: Result<RolodeckFileConfig, ConfigError>;

  if (values.config) {
    result = await loadConfigFromPath(values.config);
  } else {
    result = await loadConfig();
  }

  if (isErr(result)) {
    const e = result.data;
    process.stderr.write(`[config error] ${e.code}: ${e.message}\n`);
    if (e.filePath) {
      process.stderr.write(`  file: ${e.filePath}\n`);
    }
    process.exit(1);
  }

  return mergeCliArgs(mergeEnv(result), {
    dbPath: values['db-path'],
    uploadsDir: values['uploads-dir'],
  });
}

// ── MCP subcommand ──

async function runMcp(): Promise<void> {
  const config = await resolveConfig();

  const { setupRolodeck, teardownRolodeck, registerRolodeckTools } = await import('./index');
  const ctx = setupRolodeck(config);

  const { McpServer } = await import('@modelcontextprotocol/sdk/server/mcp.js');
  const { StdioServerTransport } = await import('@modelcontextprotocol/sdk/server/stdio.js');

  const server = new McpServer({ name: 'rolodeck', version: VERSION });
  registerRolodeckTools(server, ctx);

  const transport = new StdioServerTransport();
  transport.onclose = () => teardownRolodeck(ctx);
  await server.connect(transport);
}

// ── Seed subcommand ──

async function runSeed(): Promise<void> {
  const config = await resolveConfig();

  const { setupRolodeck, teardownRolodeck, seedSampleCards } = await import('./index');
  const ctx = setupRolodeck(config);
  try {
    const inserted = await seedSampleCards(ctx);
    process.stderr.write(
      inserted > 0
        ? `${inserted}개의 샘플 카드를 추가했습니다: ${config.dbPath}\n`
        : `이미 카드가 있어 건너뜁니다: ${config.dbPath}\n`,
    );
  } finally {
    teardownRolodeck(ctx);
  }
}

// ── Subcommand dispatch ──

const subcommand = positionals[0];

if (!subcommand) {
  printHelp();
  process.stderr.write('\nError: subcommand를 지정해야 합니다 (예: mcp)\n');
  process.exit(1);
}

if (subcommand === 'mcp') {
  await runMcp();
} else if (subcommand === 'seed') {
  await runSeed();
} else {
  process.stderr.write(`Error: 알 수 없는 subcommand "${subcommand}"\n`);
  process.stderr.write('사용 가능한 subcommand: mcp, seed\n');
  process.exit(1);
}
