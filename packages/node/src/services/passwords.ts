/**
 * Password hashing with scrypt.
 *
 * Stored format: `scrypt$<salt base64url>$<key base64url>`.
 */

import { randomBytes, scrypt, timingSafeEqual } from "node:crypto";

const SCHEME = "scrypt";
const SALT_BYTES = 16;
const KEY_LENGTH = 64;

function deriveKey(password: string, salt: Buffer): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, KEY_LENGTH, (err, key) => {
      if (err !== null) {
        reject(err);
      } else {
        resolve(key);
      }
    });
  });
}

export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(SALT_BYTES);
  const key = await deriveKey(password, salt);
  return `${SCHEME}$${salt.toString("base64url")}$${key.toString("base64url")}`;
}

/**
 * Check a password against a stored hash. Malformed hashes never match.
 */
export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  const [scheme, saltText, keyText] = stored.split("$");
  if (scheme !== SCHEME || saltText === undefined || keyText === undefined) {
    return false;
  }

  const expected = Buffer.from(keyText, "base64url");
  if (expected.length !== KEY_LENGTH) {
    return false;
  }

  const actual = await deriveKey(password, Buffer.from(saltText, "base64url"));
  return timingSafeEqual(actual, expected);
}
