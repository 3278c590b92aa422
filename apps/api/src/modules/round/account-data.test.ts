import { describe, expect, it } from "vitest";

import { classifyAccountData, normalizeAccountData } from "./account-data";

const payload = new Uint8Array([1, 2, 3, 250]);
const encoded = Buffer.from(payload).toString("base64");

describe("account-data normalization", () => {
  it("decodes a base64 pair", () => {
    expect(normalizeAccountData([encoded, "base64"])).toEqual({ ok: true, shape: "base64Pair", bytes: payload });
    expect(normalizeAccountData([encoded])).toEqual({ ok: true, shape: "base64Pair", bytes: payload });
  });

  it("decodes the data field of a keyed wrapper", () => {
    const result = normalizeAccountData({ data: [encoded, "base64"], lamports: 1, owner: "x" });
    expect(result).toEqual({ ok: true, shape: "keyedWrapper", bytes: payload });
  });

  it("passes raw bytes through unchanged", () => {
    const buffer = Buffer.from(payload);
    const result = normalizeAccountData(buffer);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.shape).toBe("rawBytes");
    expect(result.bytes).toBe(buffer);
  });

  it("accepts an ArrayBuffer as raw bytes", () => {
    const result = normalizeAccountData(payload.slice().buffer);
    expect(result).toEqual({ ok: true, shape: "rawBytes", bytes: payload });
  });

  it("rejects shapes it does not know", () => {
    for (const field of [null, undefined, 42, "AQID", {}, { data: "AQID" }, { data: [7] }, [], [123, "base64"]]) {
      expect(normalizeAccountData(field)).toEqual({ ok: false, reason: "unrecognized encoding" });
    }
  });

  it("rejects malformed base64", () => {
    expect(normalizeAccountData(["not*base64!", "base64"])).toEqual({ ok: false, reason: "invalid base64" });
    expect(normalizeAccountData(["AQI", "base64"])).toEqual({ ok: false, reason: "invalid base64" });
  });

  it("rejects pairs that declare another encoding", () => {
    expect(normalizeAccountData(["3yZe7d", "base58"])).toEqual({ ok: false, reason: "unsupported encoding base58" });
  });

  it("classifies without decoding", () => {
    expect(classifyAccountData({ data: ["!!", "base64"] })).toEqual({ kind: "keyedWrapper", encoded: "!!", encoding: "base64" });
  });
});
