import { describe, expect, it } from "vitest";

import { describeDenial } from "./denialReasons.js";

describe("describeDenial", () => {
  it("names the codes the policy service reports", () => {
    expect(describeDenial(403)).toEqual({ code: 403, reason: "Write permission denied" });
    expect(describeDenial(429)).toEqual({ code: 429, reason: "Publish rate limit exceeded" });
  });

  it("keeps unknown codes in the reason", () => {
    expect(describeDenial(499)).toEqual({ code: 499, reason: "Publish rejected by policy (code 499)" });
  });
});
