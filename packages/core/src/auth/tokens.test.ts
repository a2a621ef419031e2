import { describe, it, expect } from "vitest";
import { newSessionId, randomToken, sha256Hex } from "./tokens.js";

describe("tokens utils", () => {
  it("sha256Hex is deterministic", () => {
    expect(sha256Hex("abc")).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
  });

  it("randomToken produces url-safe strings", () => {
    const t = randomToken(16);
    expect(t).toMatch(/^[A-Za-z0-9_-]+$/);
    expect(t).toHaveLength(22);
  });

  it("session ids are 43 chars and distinct", () => {
    const a = newSessionId();
    const b = newSessionId();
    expect(a).toHaveLength(43);
    expect(a).not.toBe(b);
  });
});
