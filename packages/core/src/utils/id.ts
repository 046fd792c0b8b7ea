/**
 * Record identifiers.
 */

import { randomBytes } from 'node:crypto';

/**
 * Generate a UUID v7 (time-sortable, RFC 9562). Identifiers are opaque and
 * only unique, never persisted.
 */
export function uuidv7(): string {
  const timestamp = Date.now();
  const random = randomBytes(10);

  const uuid = Buffer.alloc(16);

  // 48-bit big-endian millisecond timestamp
  uuid.writeUIntBE(timestamp, 0, 6);

  // version (4 bits) + rand_a (12 bits)
  uuid[6] = 0x70 | ((random[0] ?? 0) & 0x0f);
  uuid[7] = random[1] ?? 0;

  // variant (2 bits) + rand_b (62 bits)
  uuid[8] = 0x80 | ((random[2] ?? 0) & 0x3f);
  random.copy(uuid, 9, 3, 10);

  const hex = uuid.toString('hex');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}
