import { compare, hash } from 'bcryptjs';

const DEFAULT_ROUNDS = 10;
const MIN_ROUNDS = 4;

/** bcrypt cost factor from BCRYPT_ROUNDS, never below MIN_ROUNDS */
function getRounds(): number {
  const raw = Number.parseInt(process.env.BCRYPT_ROUNDS ?? '', 10);
  return Number.isFinite(raw) && raw >= MIN_ROUNDS ? raw : DEFAULT_ROUNDS;
}

export async function hashPassword(plain: string): Promise<string> {
  return hash(plain, getRounds());
}

export async function verifyPassword(plain: string, passwordHash: string): Promise<boolean> {
  return compare(plain, passwordHash);
}
