import type { IncomingMessage } from 'node:http';

import { PayloadTooLargeError } from '../../errors/app-error.js';

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  return Buffer.from(String(chunk));
}

function declaredLength(req: IncomingMessage): number | undefined {
  const header = req.headers['content-length'];
  if (!header || !/^\d+$/.test(header)) return undefined;
  return Number(header);
}

/**
 * Buffers the request body up to `limit` bytes. Resolves to `undefined`
 * for an empty body.
 */
export async function readRequestBody(
  req: IncomingMessage,
  limit: number
): Promise<Buffer | undefined> {
  const declared = declaredLength(req);
  if (declared !== undefined && declared > limit) {
    throw new PayloadTooLargeError(limit);
  }

  const chunks: Buffer[] = [];
  let total = 0;
  for await (const raw of req) {
    const chunk = toBuffer(raw);
    total += chunk.length;
    if (total > limit) {
      throw new PayloadTooLargeError(limit);
    }
    chunks.push(chunk);
  }

  return total === 0 ? undefined : Buffer.concat(chunks, total);
}
