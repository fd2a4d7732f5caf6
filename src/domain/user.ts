/**
 * ユーザー識別 (表示名) に関するドメインロジック。
 */

export const DISPLAY_NAME_MAX_LENGTH = 100;

export interface UserRecord {
  id: number;
  displayName: string;
  createdAt: Date;
}

export type TextValidation = { ok: true; value: string } | { ok: false; reason: string };

/** Length in code points, matching Postgres `char_length`. */
export function textLength(value: string): number {
  return Array.from(value).length;
}

export function normalizeDisplayName(raw: string | null | undefined): TextValidation {
  const value = (raw ?? '').trim();
  if (value === '') {
    return { ok: false, reason: '表示名を入力してください。' };
  }
  if (textLength(value) > DISPLAY_NAME_MAX_LENGTH) {
    return { ok: false, reason: `表示名は${DISPLAY_NAME_MAX_LENGTH}文字以内で入力してください。` };
  }
  return { ok: true, value };
}
