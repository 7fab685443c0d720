import { randomBytes, scrypt, timingSafeEqual } from "node:crypto";
import { z } from "zod";
import { ValidationError } from "../errors.js";

const SCRYPT_KEY_BYTES = 32;

export const VerifierParamsSchema = z.object({
  N: z.number().int().min(2),
  r: z.number().int().min(1),
  p: z.number().int().min(1),
});

export type VerifierParams = z.infer<typeof VerifierParamsSchema>;

export const DEFAULT_VERIFIER_PARAMS: VerifierParams = { N: 1 << 14, r: 8, p: 1 };

export const PasswordVerifierSchema = z.object({
  version: z.literal(1),
  id: z.string().min(8),
  algorithm: z.literal("scrypt"),
  salt: z.string().min(1),
  hash: z.string().min(1),
  params: VerifierParamsSchema,
  createdAt: z.string(),
});

export type PasswordVerifier = z.infer<typeof PasswordVerifierSchema>;

function scryptAsync(password: string, salt: Buffer, params: VerifierParams): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, SCRYPT_KEY_BYTES, { N: params.N, r: params.r, p: params.p, maxmem: 64 * 1024 * 1024 }, (err, key) => {
      if (err) reject(err);
      else resolve(key);
    });
  });
}

export async function createPasswordVerifier(
  password: string,
  params: VerifierParams = DEFAULT_VERIFIER_PARAMS,
): Promise<PasswordVerifier> {
  if (!password) throw new ValidationError("password must not be empty");
  const salt = randomBytes(16);
  const hash = await scryptAsync(password, salt, params);
  return {
    version: 1,
    id: randomBytes(8).toString("hex"),
    algorithm: "scrypt",
    salt: salt.toString("base64url"),
    hash: hash.toString("base64url"),
    params: { ...params },
    createdAt: new Date().toISOString(),
  };
}

export async function verifyPassword(verifier: PasswordVerifier, password: string): Promise<boolean> {
  if (!password) return false;
  const expected = Buffer.from(verifier.hash, "base64url");
  const actual = await scryptAsync(password, Buffer.from(verifier.salt, "base64url"), verifier.params);
  if (actual.length !== expected.length) return false;
  return timingSafeEqual(actual, expected);
}
