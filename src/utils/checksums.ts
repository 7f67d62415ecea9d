import { createHash } from 'node:crypto';

export function computeChecksum16(content: string | Buffer): string {
  return sha256Hex(content).slice(0, 16);
}

export function sha256Hex(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}
