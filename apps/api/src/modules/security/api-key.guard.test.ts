import { UnauthorizedException } from "@nestjs/common";
import { describe, expect, it } from "vitest";

import { authorizeApiKey } from "./api-key.guard";

describe("authorizeApiKey", () => {
  it("leaves the API open when no key is configured", () => {
    expect(authorizeApiKey("/miner/start", undefined, undefined)).toBe(true);
  });

  it("never guards /health", () => {
    expect(authorizeApiKey("/health", undefined, "test-secret-key-0001")).toBe(true);
  });

  it("accepts the configured key", () => {
    expect(authorizeApiKey("/ledger", "test-secret-key-0001", "test-secret-key-0001")).toBe(true);
  });

  it("rejects a missing or wrong key", () => {
    expect(() => authorizeApiKey("/ledger", undefined, "test-secret-key-0001")).toThrow(UnauthorizedException);
    expect(() => authorizeApiKey("/ledger", undefined, "test-secret-key-0001")).toThrow("Missing x-api-key header.");
    expect(() => authorizeApiKey("/miner/stop", "wrong", "test-secret-key-0001")).toThrow("Invalid API key.");
  });
});
