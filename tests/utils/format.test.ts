import { describe, expect, test } from "vitest";
import { formatBytes, formatDuration } from "../../src/utils/format";

describe("format", () => {
  describe("formatBytes", () => {
    test("formats zero and plain bytes", () => {
      expect(formatBytes(0)).toBe("0 B");
      expect(formatBytes(11)).toBe("11 B");
    });

    test("formats larger units with two decimals", () => {
      expect(formatBytes(1536)).toBe("1.50 KB");
      expect(formatBytes(4 * 1024 * 1024)).toBe("4.00 MB");
      expect(formatBytes(3 * 1024 ** 3)).toBe("3.00 GB");
    });
  });

  describe("formatDuration", () => {
    test("formats each range", () => {
      expect(formatDuration(250)).toBe("250ms");
      expect(formatDuration(45_000)).toBe("45s");
      expect(formatDuration(125_000)).toBe("2m 5s");
      expect(formatDuration(3_900_000)).toBe("1h 5m");
    });
  });
});
