import crypto from "crypto";

/**
 * Stable hex digest of a string, truncated to `length` characters (MD5, 16 by default).
 * Unlike object identity hashes it is identical across processes and runs.
 */
export function hash(input: string, length = 16): string {
  return crypto.createHash("md5").update(input, "utf8").digest("hex").substring(0, length);
}
