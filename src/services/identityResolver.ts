import { normalizeDisplayName, type UserRecord } from '../domain/user.js';
import { ValidationError } from './errors.js';
import type { SessionStoreTransaction } from './sessionStore.js';

export function requireDisplayName(
  raw: string | null | undefined,
  code: 'INVALID_DISPLAY_NAME' | 'INVALID_HOST_DISPLAY_NAME' = 'INVALID_DISPLAY_NAME'
): string {
  const normalized = normalizeDisplayName(raw);
  if (!normalized.ok) {
    throw new ValidationError(code, normalized.reason);
  }
  return normalized.value;
}

/**
 * Get-or-create by exact (trimmed) display name. A concurrent creator wins the
 * insert; the loser sees `null` from `insertUser` and reads the winner's row.
 */
export async function resolveUser(tx: SessionStoreTransaction, displayName: string): Promise<UserRecord> {
  const name = requireDisplayName(displayName);
  const existing = await tx.findUserByDisplayName(name);
  if (existing) {
    return existing;
  }
  const created = await tx.insertUser(name);
  if (created) {
    return created;
  }
  const winner = await tx.findUserByDisplayName(name);
  if (!winner) {
    throw new Error(`user "${name}" conflicted on insert but could not be read back`);
  }
  return winner;
}
