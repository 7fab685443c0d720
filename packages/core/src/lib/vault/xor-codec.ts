import { CodecError } from "../errors.js";

export function xorBytes(payload: Uint8Array, keystream: Uint8Array): Buffer {
  if (keystream.length < payload.length) {
    throw new CodecError(`keystream too short: ${keystream.length} < ${payload.length}`);
  }
  const out = Buffer.alloc(payload.length);
  for (let i = 0; i < payload.length; i += 1) {
    out[i] = (payload[i] ?? 0) ^ (keystream[i] ?? 0);
  }
  return out;
}

// XOR is its own inverse; the two names only document intent at call sites.
export const encodeToken = xorBytes;
export const decodeToken = xorBytes;
