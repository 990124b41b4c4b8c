import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { createConfig } from '../../config/index.js';
import type { AlbumRecord, AppConfig } from '../../types/index.js';

export const FIXTURES_DIR = fileURLToPath(new URL('./fixtures/', import.meta.url));

export function testConfig(overrides: NodeJS.ProcessEnv = {}): AppConfig {
  return createConfig({
    LOG_LEVEL: 'error',
    OPEN_REPORT: 'false',
    ...overrides,
  });
}

export async function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `${prefix}-`));
}

export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

export function album(
  artist: string,
  title: string,
  extra: Partial<AlbumRecord> = {}
): AlbumRecord {
  return { artist, title, sourceType: 'list', ...extra };
}

/** Wraps markup in a single-part web archive the way browsers save pages. */
export function buildArchive(
  body: string,
  options: { encoding?: string; contentType?: string; boundary?: string } = {}
): string {
  const boundary = options.boundary ?? '----MultipartBoundary--testboundary----';
  const encoding = options.encoding ?? 'quoted-printable';
  const contentType = options.contentType ?? 'text/html';

  return [
    'From: <Saved by Blink>',
    'Snapshot-Content-Location: https://rateyourmusic.com/list/test/',
    'Subject: Test list',
    'MIME-Version: 1.0',
    'Content-Type: multipart/related;',
    '\ttype="text/html";',
    `\tboundary="${boundary}"`,
    '',
    '',
    `--${boundary}`,
    `Content-Type: ${contentType}`,
    `Content-Transfer-Encoding: ${encoding}`,
    'Content-Location: https://rateyourmusic.com/list/test/',
    '',
    body,
    '',
    `--${boundary}`,
    'Content-Type: text/css',
    'Content-Transfer-Encoding: quoted-printable',
    'Content-Location: cid:css-test@mhtml.blink',
    '',
    'body { color: red; }',
    '',
    `--${boundary}--`,
    '',
  ].join('\r\n');
}
