import { pbkdf2, randomBytes, timingSafeEqual } from 'node:crypto';
import { promisify } from 'node:util';

const pbkdf2Async = promisify(pbkdf2);

const ITERATIONS = 100_000;
const KEY_LENGTH = 32;
const SALT_LENGTH = 16;
const DIGEST = 'sha256';

function deriveKey(password: string, salt: Buffer): Promise<Buffer> {
  return pbkdf2Async(password, salt, ITERATIONS, KEY_LENGTH, DIGEST);
}

/** Returns `base64(salt):base64(hash)`. */
export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(SALT_LENGTH);
  const hash = await deriveKey(password, salt);
  return `${salt.toString('base64')}:${hash.toString('base64')}`;
}

export async function verifyPassword(
  password: string,
  stored: string
): Promise<boolean> {
  const [saltB64, hashB64] = stored.split(':');
  if (!saltB64 || !hashB64) return false;

  const salt = Buffer.from(saltB64, 'base64');
  const expectedHash = Buffer.from(hashB64, 'base64');
  const derivedHash = await deriveKey(password, salt);

  if (derivedHash.length !== expectedHash.length) return false;
  return timingSafeEqual(derivedHash, expectedHash);
}
