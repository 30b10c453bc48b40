import type { DenialReason } from "../errors.js";

const KNOWN_REASONS: ReadonlyMap<number, string> = new Map([
  [401, "Session is not authorized"],
  [403, "Write permission denied"],
  [404, "Topic does not exist"],
  [413, "Message too large"],
  [429, "Publish rate limit exceeded"],
]);

export function describeDenial(code: number): DenialReason {
  const known = KNOWN_REASONS.get(code);
  if (known) {
    return { code, reason: known };
  }
  return { code, reason: `Publish rejected by policy (code ${code})` };
}
