import { describe, it, expect } from "vitest";
import { MemoryParams, PRIME_REDIRECTED } from "./params.js";

describe("MemoryParams", () => {
  it("reads missing keys as false", () => {
    expect(new MemoryParams().getBool(PRIME_REDIRECTED)).toBe(false);
  });

  it("only treats \"1\" as true", () => {
    const params = new MemoryParams({ [PRIME_REDIRECTED]: "1", Other: "true" });
    expect(params.getBool(PRIME_REDIRECTED)).toBe(true);
    expect(params.getBool("Other")).toBe(false);
  });

  it("round-trips booleans through their stored form", () => {
    const params = new MemoryParams();
    params.putBool(PRIME_REDIRECTED, true);
    expect(params.get(PRIME_REDIRECTED)).toBe("1");
    params.putBool(PRIME_REDIRECTED, false);
    expect(params.get(PRIME_REDIRECTED)).toBe("0");
    expect(params.getBool(PRIME_REDIRECTED)).toBe(false);
  });

  it("removes keys", () => {
    const params = new MemoryParams({ [PRIME_REDIRECTED]: "1" });
    params.remove(PRIME_REDIRECTED);
    expect(params.get(PRIME_REDIRECTED)).toBeUndefined();
  });
});
