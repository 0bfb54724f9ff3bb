import { describe, expect, it } from "vitest";

import { VERSION } from "./version.js";

describe("VERSION", () => {
  it("is read from package.json", () => {
    expect(VERSION).toMatch(/^\d+\.\d+\.\d+/);
  });
});
