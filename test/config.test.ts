import { describe, it, expect } from "vitest";
import { resolveExportOptions, DEFAULTS } from "../src/config.js";

describe("config", () => {
  it("returns the defaults when nothing is passed", () => {
    expect(resolveExportOptions()).toEqual({ verbose: false, prefixCollisions: "warn" });
    expect(resolveExportOptions()).not.toBe(DEFAULTS);
  });

  it("overrides only the given options", () => {
    expect(resolveExportOptions({ prefixCollisions: "error" })).toEqual({
      verbose: false,
      prefixCollisions: "error",
    });
  });

  it("ignores explicitly undefined values", () => {
    expect(resolveExportOptions({ verbose: undefined })).toEqual(DEFAULTS);
  });
});
