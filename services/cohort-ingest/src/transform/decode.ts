import { gunzipSync } from 'node:zlib';
import { TextDecoder } from 'node:util';

const GZIP_MAGIC = [0x1f, 0x8b];

export function isGzip(payload: Buffer): boolean {
  return payload.length >= 2 && payload[0] === GZIP_MAGIC[0] && payload[1] === GZIP_MAGIC[1];
}

export function decodePayload(payload: Buffer): string {
  const raw = isGzip(payload) ? gunzipSync(payload) : payload;
  return new TextDecoder('utf-8', { fatal: true }).decode(raw).replace(/^\uFEFF/, '');
}
