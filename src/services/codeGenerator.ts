import { generateJoinCode, JOIN_CODE_LENGTH, type RandomIndex } from '../domain/joinCode.js';
import { ConflictError } from './errors.js';
import type { SessionStoreTransaction } from './sessionStore.js';

export const MAX_CODE_ATTEMPTS = 10;

export interface CodeGeneratorOptions {
  length?: number;
  maxAttempts?: number;
  randomIndex?: RandomIndex;
}

/**
 * Draws codes until `insert` accepts one. A code already in the store, or an
 * insert that returns `null` because a concurrent writer took the code first,
 * both count as a collision and use up one attempt.
 */
export async function insertWithUniqueCode<T>(
  tx: Pick<SessionStoreTransaction, 'sessionCodeExists'>,
  insert: (code: string) => Promise<T | null>,
  options: CodeGeneratorOptions = {}
): Promise<T> {
  const length = options.length ?? JOIN_CODE_LENGTH;
  const maxAttempts = options.maxAttempts ?? MAX_CODE_ATTEMPTS;
  for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
    const candidate = generateJoinCode(length, options.randomIndex);
    if (await tx.sessionCodeExists(candidate)) {
      continue;
    }
    const inserted = await insert(candidate);
    if (inserted !== null) {
      return inserted;
    }
  }
  throw new ConflictError('CODE_COLLISION_EXHAUSTED', '参加コードの生成に失敗しました。時間をおいて再度お試しください。');
}
