import { createHash, randomBytes } from "node:crypto";
import { ValidationError } from "../errors.js";

export const SALT_BYTES = 16;
const BLOCK_BYTES = 32;

export function generateSalt(): Buffer {
  return randomBytes(SALT_BYTES);
}

/**
 * Keystream for the token vault: SHA-256 in counter mode over
 * `password || 0x00 || salt || uint32be(counter)`, truncated to `length`.
 * Same password and salt always give the same bytes; only the password is secret.
 */
export function deriveKeystream(password: string, salt: Uint8Array, length: number): Buffer {
  if (!password) throw new ValidationError("password must not be empty");
  if (!Number.isInteger(length) || length < 0) throw new ValidationError(`invalid keystream length: ${length}`);

  const passwordBytes = Buffer.from(password, "utf8");
  const separator = Buffer.from([0]);
  const blocks: Buffer[] = [];
  const counter = Buffer.alloc(4);
  for (let i = 0; blocks.length * BLOCK_BYTES < length; i += 1) {
    counter.writeUInt32BE(i, 0);
    blocks.push(createHash("sha256").update(passwordBytes).update(separator).update(salt).update(counter).digest());
  }
  const out = Buffer.concat(blocks).subarray(0, length);
  passwordBytes.fill(0);
  return Buffer.from(out);
}
