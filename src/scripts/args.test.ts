import { describe, expect, it } from "vitest";
import { getFlag, hasFlag } from "./args.js";

describe("getFlag", () => {
  it("returns the token after the flag", () => {
    expect(getFlag("device", ["--device", "d1", "--from", "2024-01-01 00:00"])).toBe("d1");
    expect(getFlag("from", ["--device", "d1", "--from", "2024-01-01 00:00"])).toBe(
      "2024-01-01 00:00"
    );
  });

  it("does not take the next flag as the value", () => {
    const argv = ["--device", "--from", "2024-01-01 00:00"];

    expect(getFlag("device", argv)).toBeUndefined();
    expect(getFlag("from", argv)).toBe("2024-01-01 00:00");
  });

  it("returns undefined for a missing or trailing flag", () => {
    expect(getFlag("to", ["--device", "d1"])).toBeUndefined();
    expect(getFlag("device", ["--device"])).toBeUndefined();
  });
});

describe("hasFlag", () => {
  it("detects a bare flag", () => {
    expect(hasFlag("yes", ["--yes"])).toBe(true);
    expect(hasFlag("yes", [])).toBe(false);
  });
});
