import { createHash } from "node:crypto";

/**
 * Deterministic record id.
 *
 * A 16-char hex hash of the parts joined with `|`, prefixed by the record
 * kind so ids from different tables never collide.
 */
export function recordId(prefix: string, ...parts: (string | number)[]): string {
  const input = parts.join("|");
  return `${prefix}_${createHash("sha256").update(input).digest("hex").slice(0, 16)}`;
}
