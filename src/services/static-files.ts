import { createReadStream, type Stats } from 'node:fs';
import { readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';

import type { Request, Response } from 'express';

import {
  DEFAULT_INDEX_FILES,
  HTML_CONTENT_TYPE,
  NOT_FOUND_PAGE,
} from '../config/constants.js';
import type {
  PageDescriptor,
  RouteConfig,
  StaticBehavior,
} from '../config/types.js';

import {
  BadRequestError,
  InternalError,
  MethodNotAllowedError,
} from '../errors/app-error.js';

import { getErrorMessage, isMissingFileError } from '../utils/error-utils.js';

import { sha256Hex } from '../crypto.js';
import type { AppContext } from './app-context.js';
import { compressBody, negotiateEncoding } from './compression.js';
import type { Dispatch } from './dispatcher.js';
import { logError } from './logger.js';

export interface FoundFile {
  readonly path: string;
  readonly stats: Stats;
}

const ETAG_DIGEST_LENGTH = 32;

/** Weak validator over path, creation time, modification time and size. */
export function computeEtag(filePath: string, stats: Stats): string {
  const digest = sha256Hex(
    `${filePath}:${stats.birthtimeMs}:${stats.mtimeMs}:${stats.size}`
  );
  return `W/"${digest.slice(0, ETAG_DIGEST_LENGTH)}"`;
}

/** Resolves `relative` under `root`, or `null` when it would escape the root. */
export function resolveInsideRoot(
  root: string,
  relative: string
): string | null {
  const resolvedRoot = path.resolve(root);
  const target = path.resolve(resolvedRoot, `.${path.sep}${relative}`);
  if (target === resolvedRoot || target.startsWith(`${resolvedRoot}${path.sep}`)) {
    return target;
  }
  return null;
}

function decodeCapture(capture: string | undefined): string {
  if (!capture) return '';
  let decoded: string;
  try {
    decoded = decodeURIComponent(capture);
  } catch {
    throw new BadRequestError('Malformed percent-encoding in path', {
      capture,
    });
  }
  if (decoded.includes('\0')) {
    throw new BadRequestError('NUL byte in path', { capture });
  }
  return decoded;
}

async function statOrNull(filePath: string): Promise<Stats | null> {
  try {
    return await stat(filePath);
  } catch (error: unknown) {
    if (isMissingFileError(error)) return null;
    logError('Failed to stat file', {
      path: filePath,
      error: getErrorMessage(error),
    });
    throw new InternalError('File system error', { path: filePath });
  }
}

async function findFile(
  root: string,
  candidates: readonly string[]
): Promise<FoundFile | null> {
  for (const candidate of candidates) {
    const filePath = resolveInsideRoot(root, candidate);
    if (!filePath) continue;
    const stats = await statOrNull(filePath);
    if (stats?.isFile()) return { path: filePath, stats };
  }
  return null;
}

function candidateFiles(behavior: StaticBehavior, relative: string): string[] {
  if (relative.includes('.')) return [relative];
  const indexFiles =
    behavior.index.length > 0 ? behavior.index : DEFAULT_INDEX_FILES;
  return indexFiles.map((name) => path.join(relative, name));
}

async function findStaticFile(
  behavior: StaticBehavior,
  capture: string | undefined
): Promise<FoundFile | null> {
  const relative = decodeCapture(capture);
  return findFile(behavior.root, candidateFiles(behavior, relative));
}

function isHead(req: Request): boolean {
  return req.method === 'HEAD';
}

/** Writes a file with ETag validation and optional compression. */
async function sendFile(
  req: Request,
  res: Response,
  file: FoundFile,
  status: number,
  contentType: string
): Promise<void> {
  const etag = computeEtag(file.path, file.stats);
  res.setHeader('Content-Type', contentType);
  res.setHeader('ETag', etag);

  if (req.headers['if-none-match'] === etag) {
    res.status(304).end();
    return;
  }

  res.status(status);
  const encoding = negotiateEncoding(req.headers['accept-encoding']);
  if (encoding) {
    const body = await compressBody(encoding, await readFile(file.path));
    res.setHeader('Content-Encoding', encoding);
    res.setHeader('Vary', 'Accept-Encoding');
    res.setHeader('Content-Length', body.length);
    res.end(isHead(req) ? undefined : body);
    return;
  }

  res.setHeader('Content-Length', file.stats.size);
  if (isHead(req)) {
    res.end();
    return;
  }
  await pipeline(createReadStream(file.path), res);
}

function sendGenericNotFound(req: Request, res: Response): void {
  res.status(404);
  res.setHeader('Content-Type', HTML_CONTENT_TYPE);
  res.end(isHead(req) ? undefined : NOT_FOUND_PAGE);
}

/** Serves a configured page file from the route's pages root with its own status. */
export async function serveCustomPage(
  context: AppContext,
  route: RouteConfig,
  page: PageDescriptor,
  req: Request,
  res: Response
): Promise<void> {
  const file = route.pagesRoot
    ? await findFile(route.pagesRoot, [page.page])
    : null;
  if (!file) {
    sendGenericNotFound(req, res);
    return;
  }
  await sendFile(req, res, file, page.status, context.mime.lookup(file.path));
}

function escapeHtml(value: string): string {
  return value
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;');
}

export function renderDirectoryListing(
  requestPath: string,
  entries: readonly { name: string; directory: boolean }[]
): string {
  const title = escapeHtml(requestPath);
  const items = entries
    .map(({ name, directory }) => {
      const label = directory ? `${name}/` : name;
      return `    <li><a href="${encodeURIComponent(name)}${directory ? '/' : ''}">${escapeHtml(label)}</a></li>`;
    })
    .join('\n');
  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="UTF-8" />
    <title>Index of ${title}</title>
  </head>
  <body>
    <h1>Index of ${title}</h1>
    <ul>
${items}
    </ul>
  </body>
</html>
`;
}

async function sendDirectoryListing(
  req: Request,
  res: Response,
  directory: string
): Promise<void> {
  const dirents = await readdir(directory, { withFileTypes: true });
  const entries = dirents
    .map((entry) => ({ name: entry.name, directory: entry.isDirectory() }))
    .sort((a, b) => a.name.localeCompare(b.name));
  const requestPath = req.path.endsWith('/') ? req.path : `${req.path}/`;

  res.status(200);
  res.setHeader('Content-Type', HTML_CONTENT_TYPE);
  res.end(isHead(req) ? undefined : renderDirectoryListing(requestPath, entries));
}

async function findListableDirectory(
  behavior: StaticBehavior,
  capture: string | undefined
): Promise<string | null> {
  const relative = decodeCapture(capture);
  if (!behavior.autoIndex || relative.includes('.')) return null;
  const directory = resolveInsideRoot(behavior.root, relative);
  if (!directory) return null;
  const stats = await statOrNull(directory);
  return stats?.isDirectory() ? directory : null;
}

export async function serveStatic(
  context: AppContext,
  dispatch: Dispatch,
  req: Request,
  res: Response
): Promise<void> {
  const { route, capture } = dispatch;
  if (route.behavior.kind !== 'static') {
    throw new InternalError('Static responder invoked on a non-static route', {
      location: route.location,
    });
  }
  if (req.method !== 'GET' && req.method !== 'HEAD') {
    res.setHeader('Allow', 'GET, HEAD');
    throw new MethodNotAllowedError(req.method);
  }

  const behavior = route.behavior;
  const file = await findStaticFile(behavior, capture);
  if (file) {
    await sendFile(req, res, file, 200, context.mime.lookup(file.path));
    return;
  }

  const directory = await findListableDirectory(behavior, capture);
  if (directory) {
    await sendDirectoryListing(req, res, directory);
    return;
  }

  const page = route.notFoundPage ?? route.errorPage;
  if (page) {
    await serveCustomPage(context, route, page, req, res);
    return;
  }
  sendGenericNotFound(req, res);
}
