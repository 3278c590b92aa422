/**
 * Shapes an RPC account `data` field is known to arrive in:
 * - `["<base64>", "base64"]` as returned by the JSON-RPC `getProgramAccounts` call
 * - `{ data: ["<base64>", "base64"] }` when the whole account object is handed over
 * - raw bytes, as `@solana/web3.js` returns them
 */
export type AccountDataShape =
  | { kind: "base64Pair"; encoded: string; encoding: string | undefined }
  | { kind: "keyedWrapper"; encoded: string; encoding: string | undefined }
  | { kind: "rawBytes"; bytes: Uint8Array };

export type AccountDataResult =
  | { ok: true; shape: AccountDataShape["kind"]; bytes: Uint8Array }
  | { ok: false; reason: string };

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

function asBase64Pair(value: unknown): { encoded: string; encoding: string | undefined } | null {
  if (!Array.isArray(value) || value.length === 0) return null;
  const [encoded, encoding] = value;
  if (typeof encoded !== "string") return null;
  return { encoded, encoding: typeof encoding === "string" ? encoding : undefined };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function classifyAccountData(field: unknown): AccountDataShape | null {
  if (field instanceof Uint8Array) {
    return { kind: "rawBytes", bytes: field };
  }
  if (field instanceof ArrayBuffer) {
    return { kind: "rawBytes", bytes: new Uint8Array(field) };
  }

  const pair = asBase64Pair(field);
  if (pair) {
    return { kind: "base64Pair", ...pair };
  }

  if (isRecord(field) && "data" in field) {
    const inner = asBase64Pair(field.data);
    if (inner) {
      return { kind: "keyedWrapper", ...inner };
    }
  }

  return null;
}

function decodeBase64(encoded: string): Uint8Array | null {
  const compact = encoded.replace(/\s+/g, "");
  if (compact.length % 4 !== 0 || !BASE64_RE.test(compact)) return null;
  return new Uint8Array(Buffer.from(compact, "base64"));
}

export function normalizeAccountData(field: unknown): AccountDataResult {
  const shape = classifyAccountData(field);
  if (!shape) {
    return { ok: false, reason: "unrecognized encoding" };
  }

  switch (shape.kind) {
    case "rawBytes":
      return { ok: true, shape: shape.kind, bytes: shape.bytes };
    case "base64Pair":
    case "keyedWrapper": {
      if (shape.encoding !== undefined && shape.encoding !== "base64") {
        return { ok: false, reason: `unsupported encoding ${shape.encoding}` };
      }
      const bytes = decodeBase64(shape.encoded);
      if (!bytes) {
        return { ok: false, reason: "invalid base64" };
      }
      return { ok: true, shape: shape.kind, bytes };
    }
  }
}
