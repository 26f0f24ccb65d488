import { createHash } from 'node:crypto';

type HashAlgorithm = 'sha1' | 'sha256';

function hashHex(algorithm: HashAlgorithm, input: string | Uint8Array): string {
  return createHash(algorithm).update(input).digest('hex');
}

export function sha256Hex(input: string | Uint8Array): string {
  return hashHex('sha256', input);
}

/** Unsigned 32-bit integer taken from the head of a SHA-1 digest. */
export function hashToUint32(input: string): number {
  const digest = createHash('sha1').update(input).digest();
  return digest.readUInt32BE(0);
}
