import { promisify } from 'node:util';
import zlib from 'node:zlib';

export type ContentEncoding = 'gzip' | 'deflate' | 'br';

// zstd leads the preference order, but Node.js 20 ships no zstd codec,
// so only the encodings zlib provides are offered.
const PREFERENCE: readonly ContentEncoding[] = ['gzip', 'deflate', 'br'];

const gzip = promisify(zlib.gzip);
const deflate = promisify(zlib.deflate);
const brotli = promisify(zlib.brotliCompress);

export function negotiateEncoding(
  acceptEncoding: string | undefined
): ContentEncoding | undefined {
  if (!acceptEncoding) return undefined;
  const header = acceptEncoding.toLowerCase();
  return PREFERENCE.find((encoding) => header.includes(encoding));
}

export async function compressBody(
  encoding: ContentEncoding,
  body: Buffer
): Promise<Buffer> {
  switch (encoding) {
    case 'gzip':
      return gzip(body);
    case 'deflate':
      return deflate(body);
    case 'br':
      return brotli(body);
  }
}
