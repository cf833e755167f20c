import { createHash } from "crypto";

/** SHA-256 hash of string as 64-char hex (for token lookup). */
export function sha256Hex(value: string): string {
  return createHash("sha256").update(value, "utf8").digest("hex");
}
