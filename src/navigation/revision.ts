import { createHash } from 'crypto';

/**
 * Content hash usable as a snapshot revision
 */
export function computeRevision(text: string): string {
  return createHash('sha256').update(text).digest('hex').slice(0, 16);
}
