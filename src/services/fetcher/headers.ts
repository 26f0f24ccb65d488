/** Headers meaningful only to a single connection. Never forwarded. */
export const HOP_BY_HOP_HEADERS: ReadonlySet<string> = new Set([
  'host',
  'connection',
  'proxy-authenticate',
  'upgrade',
  'proxy-authorization',
  'keep-alive',
  'transfer-encoding',
  'te',
]);

export type HeaderValue = string | string[];
export type HeaderRecord = Record<string, HeaderValue>;

function connectionTokens(value: HeaderValue | undefined): Set<string> {
  const raw = Array.isArray(value) ? value.join(',') : (value ?? '');
  return new Set(
    raw
      .split(',')
      .map((token) => token.trim().toLowerCase())
      .filter((token) => token.length > 0)
  );
}

/**
 * Copies `headers` without the hop-by-hop set and without any header the
 * `Connection` header names.
 */
export function stripHopByHop(
  headers: Readonly<Record<string, HeaderValue | undefined>>
): HeaderRecord {
  const listed = connectionTokens(headers['connection']);
  const result: HeaderRecord = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    const key = name.toLowerCase();
    if (HOP_BY_HOP_HEADERS.has(key) || listed.has(key)) continue;
    result[key] = value;
  }
  return result;
}

export interface ForwardedFor {
  readonly clientIp: string | undefined;
  readonly host: string | undefined;
  readonly proto: string;
}

function appendForwardedFor(
  existing: HeaderValue | undefined,
  clientIp: string
): string {
  const prior = Array.isArray(existing) ? existing.join(', ') : existing;
  return prior ? `${prior}, ${clientIp}` : clientIp;
}

export function withForwardedHeaders(
  headers: HeaderRecord,
  forwarded: ForwardedFor
): HeaderRecord {
  const result: HeaderRecord = { ...headers };
  if (forwarded.clientIp) {
    result['x-forwarded-for'] = appendForwardedFor(
      headers['x-forwarded-for'],
      forwarded.clientIp
    );
  }
  if (forwarded.host) result['x-forwarded-host'] = forwarded.host;
  result['x-forwarded-proto'] = forwarded.proto;
  return result;
}
