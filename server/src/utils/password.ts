import bcrypt from "bcrypt";

export const SALT_ROUNDS = 12;

export async function hashPassword(password: string, rounds = SALT_ROUNDS): Promise<string> {
  return bcrypt.hash(password, rounds);
}

export async function comparePassword(password: string, hash: string): Promise<boolean> {
  return bcrypt.compare(password, hash);
}

/**
 * True when `hash` was made with fewer rounds than currently configured,
 * e.g. accounts created before the cost factor was raised.
 */
export function needsRehash(hash: string, rounds = SALT_ROUNDS): boolean {
  return bcrypt.getRounds(hash) < rounds;
}
