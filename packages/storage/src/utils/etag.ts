import { createHash } from 'node:crypto';

export function computeEtag(body: Buffer): string {
  return createHash('sha1').update(body).digest('hex');
}

export function toBuffer(body: Buffer | string): Buffer {
  return typeof body === 'string' ? Buffer.from(body, 'utf8') : body;
}
