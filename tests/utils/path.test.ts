import * as os from "node:os";
import * as path from "node:path";
import { describe, expect, test } from "vitest";
import { expandHome, isPathWithinDir, resolveFrom } from "../../src/utils/path";

describe("path helpers", () => {
  describe("isPathWithinDir", () => {
    test("accepts entries inside the directory", () => {
      expect(isPathWithinDir("/media/vault/docs", "/media/vault")).toBe(true);
      expect(isPathWithinDir("/media/vault/a/../b", "/media/vault")).toBe(true);
    });

    test("rejects the directory itself, siblings and escapes", () => {
      expect(isPathWithinDir("/media/vault", "/media/vault")).toBe(false);
      expect(isPathWithinDir("/media/vault2/x", "/media/vault")).toBe(false);
      expect(isPathWithinDir("/media/vault/../etc", "/media/vault")).toBe(false);
    });
  });

  describe("expandHome", () => {
    test("expands a leading tilde", () => {
      expect(expandHome("~", "/home/alice")).toBe("/home/alice");
      expect(expandHome("~/Vaults/main.hc", "/home/alice")).toBe("/home/alice/Vaults/main.hc");
    });

    test("leaves other paths alone", () => {
      expect(expandHome("/srv/~data", "/home/alice")).toBe("/srv/~data");
      expect(expandHome("~bob/x", "/home/alice")).toBe("~bob/x");
    });
  });

  describe("resolveFrom", () => {
    test("resolves relative paths against the base", () => {
      expect(resolveFrom("/home/alice", "Documents")).toBe("/home/alice/Documents");
    });

    test("keeps absolute paths, normalized", () => {
      expect(resolveFrom("/home/alice", "/srv//data/")).toBe("/srv/data/");
    });

    test("expands the home directory first", () => {
      expect(resolveFrom("/elsewhere", "~/Pictures")).toBe(path.join(os.homedir(), "Pictures"));
    });
  });
});
