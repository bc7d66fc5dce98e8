import { hmacSha1Hex, SIGNATURE_HEX_LENGTH } from "../../../src/core/hmac";

describe("hmacSha1Hex", () => {
  it("should match the RFC 2202 test vector", () => {
    expect(hmacSha1Hex("Jefe", "what do ya want for nothing?")).toBe(
      "effcdf6ae5eb2fa2d27416d5f184df9c259a7c79",
    );
  });

  it("should produce 40 lowercase hex characters", () => {
    const digest = hmacSha1Hex("test-secret", "<config/>");
    expect(digest).toHaveLength(SIGNATURE_HEX_LENGTH);
    expect(digest).toMatch(/^[0-9a-f]{40}$/);
  });

  it("should use the key exactly as given", () => {
    expect(hmacSha1Hex("test-secret ", "<config/>")).not.toBe(hmacSha1Hex("test-secret", "<config/>"));
  });
});
