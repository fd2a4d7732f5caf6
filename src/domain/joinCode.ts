import { randomInt } from 'node:crypto';

export const JOIN_CODE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const JOIN_CODE_LENGTH = 6;

const JOIN_CODE_PATTERN = new RegExp(`^[A-Z0-9]{${JOIN_CODE_LENGTH}}$`);

/** Returns an integer in `[0, maxExclusive)`. */
export type RandomIndex = (maxExclusive: number) => number;

const secureRandomIndex: RandomIndex = (maxExclusive) => randomInt(maxExclusive);

export function generateJoinCode(length: number = JOIN_CODE_LENGTH, randomIndex: RandomIndex = secureRandomIndex): string {
  let code = '';
  for (let i = 0; i < length; i += 1) {
    const index = randomIndex(JOIN_CODE_ALPHABET.length);
    const char = JOIN_CODE_ALPHABET.charAt(index);
    if (char === '') {
      throw new RangeError(`random index ${index} is outside the join code alphabet`);
    }
    code += char;
  }
  return code;
}

export function isJoinCode(value: string): boolean {
  return JOIN_CODE_PATTERN.test(value);
}
