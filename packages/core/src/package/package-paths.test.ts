import { describe, it, expect } from "vitest";
import { normalizePackagePath, isRecord } from "./package-paths.js";

describe("normalizePackagePath", () => {
  it("keeps simple relative paths", () => {
    expect(normalizePackagePath("lib/helpers.js")).toBe("lib/helpers.js");
  });

  it("converts backslashes and drops dot segments", () => {
    expect(normalizePackagePath(".\\lib\\.\\helpers.js")).toBe("lib/helpers.js");
  });

  it.each(["../escape.js", "lib/../../escape.js", "/etc/passwd", "C:/tools/x.js", "", "./"])(
    "rejects %j",
    (raw) => {
      expect(normalizePackagePath(raw)).toBeNull();
    },
  );
});

describe("isRecord", () => {
  it("accepts plain objects only", () => {
    expect(isRecord({ a: 1 })).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord("x")).toBe(false);
  });
});
