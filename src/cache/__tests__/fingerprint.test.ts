import { describe, it, expect } from "vitest";
import { canonicalize, fingerprint } from "../fingerprint.js";
import type { FingerprintInput } from "../types.js";

function makeInput(overrides: Partial<FingerprintInput> = {}): FingerprintInput {
  return {
    endpoint: "campaigns",
    objectId: "act_123",
    params: { limit: 50, fields: ["id", "name"] },
    credentialId: "cred-a",
    ...overrides,
  };
}

describe("canonicalize", () => {
  it("sorts object keys and drops undefined members", () => {
    expect(canonicalize({ b: 1, a: "x", c: undefined })).toBe('{"a":"x","b":1}');
  });

  it("keeps list order unless the key is unordered", () => {
    expect(canonicalize({ fields: ["b", "a"] })).toBe('{"fields":["b","a"]}');
    expect(canonicalize({ statuses: ["PAUSED", "ACTIVE"] }, new Set(["statuses"]))).toBe(
      '{"statuses":["ACTIVE","PAUSED"]}',
    );
  });
});

describe("fingerprint", () => {
  it("is independent of named parameter order", () => {
    const a = fingerprint(makeInput({ params: { limit: 50, fields: ["id"] } }));
    const b = fingerprint(makeInput({ params: { fields: ["id"], limit: 50 } }));
    expect(a).toBe(b);
  });

  it("depends on the order of ordered list parameters", () => {
    const a = fingerprint(makeInput({ params: { fields: ["id", "name"] } }));
    const b = fingerprint(makeInput({ params: { fields: ["name", "id"] } }));
    expect(a).not.toBe(b);
  });

  it("ignores the order of unordered list parameters", () => {
    const a = fingerprint(makeInput({ params: { statuses: ["ACTIVE", "PAUSED"] } }), ["statuses"]);
    const b = fingerprint(makeInput({ params: { statuses: ["PAUSED", "ACTIVE"] } }), ["statuses"]);
    expect(a).toBe(b);
  });

  it("differs per credential, endpoint and object", () => {
    const base = fingerprint(makeInput());
    expect(fingerprint(makeInput({ credentialId: "cred-b" }))).not.toBe(base);
    expect(fingerprint(makeInput({ endpoint: "adsets" }))).not.toBe(base);
    expect(fingerprint(makeInput({ objectId: "act_456" }))).not.toBe(base);
  });

  it("is a sha256 hex digest", () => {
    expect(fingerprint(makeInput())).toMatch(/^[0-9a-f]{64}$/);
  });
});
