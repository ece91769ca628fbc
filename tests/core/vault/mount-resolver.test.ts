import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { parseMountPoint, resolveMountPoint } from "../../../src/core/vault/mount-resolver";
import { dismountCommand, listCommand, mountCommand, testCommand } from "../../../src/core/vault/veracrypt";
import { createFakeRunner } from "../../helpers/fake-runner";

describe("veracrypt commands", () => {
  test("build the expected argv", () => {
    expect(listCommand()).toEqual(["veracrypt", "--text", "--list"]);
    expect(mountCommand("/v.hc", "test-secret")).toEqual([
      "veracrypt",
      "--text",
      "--non-interactive",
      "--mount",
      "/v.hc",
      "--password",
      "test-secret",
    ]);
    expect(dismountCommand("/media/veracrypt1")).toEqual([
      "veracrypt",
      "--text",
      "--non-interactive",
      "--dismount",
      "/media/veracrypt1",
    ]);
    expect(testCommand("/v.hc", "test-secret")).toEqual([
      "veracrypt",
      "--text",
      "--test",
      "--password",
      "test-secret",
      "--non-interactive",
      "/v.hc",
    ]);
  });
});

describe("mount resolver", () => {
  let tempDir: string;
  let mountDir: string;
  const container = "/home/alice/Vaults/main.hc";

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "vaultsync-resolver-"));
    mountDir = path.join(tempDir, "veracrypt1");
    await fs.mkdir(mountDir);
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("parseMountPoint", () => {
    test("takes the last token of the matching line", async () => {
      const listing = [
        "1: /home/alice/Vaults/other.hc /dev/mapper/veracrypt2 /media/veracrypt2",
        `2: ${container} /dev/mapper/veracrypt1 ${mountDir}`,
      ].join("\n");

      expect(await parseMountPoint(listing, container)).toBe(mountDir);
    });

    test("does not match a container whose path extends this one", async () => {
      const listing = `2: ${container}.old /dev/mapper/veracrypt2 ${mountDir}`;
      expect(await parseMountPoint(listing, container)).toBeNull();
    });

    test("does not match a container path that only appears later in the line", async () => {
      const listing = `3: /home/alice/Backups${container} /dev/mapper/veracrypt3 ${mountDir}`;
      expect(await parseMountPoint(listing, container)).toBeNull();
    });

    test("matches a container path containing spaces", async () => {
      const spaced = "/home/alice/My Vaults/main.hc";
      const listing = `1: ${spaced} /dev/mapper/veracrypt1 ${mountDir}`;
      expect(await parseMountPoint(listing, spaced)).toBe(mountDir);
    });

    test("ignores a last token that is not an existing directory", async () => {
      const listing = `1: ${container} /dev/mapper/veracrypt1 ${path.join(tempDir, "missing")}`;
      expect(await parseMountPoint(listing, container)).toBeNull();
    });

    test("ignores lines with too few tokens", async () => {
      expect(await parseMountPoint(`${container} ${mountDir}`, container)).toBeNull();
    });

    test("returns null when the container is not listed", async () => {
      expect(await parseMountPoint("", container)).toBeNull();
    });
  });

  describe("resolveMountPoint", () => {
    test("lists volumes with the given elevation", async () => {
      const fake = createFakeRunner(() => `1: ${container} /dev/mapper/veracrypt1 ${mountDir}\n`);

      const mountPoint = await resolveMountPoint(container, { runner: fake.runner, elevation: "" });

      expect(mountPoint).toBe(mountDir);
      expect(fake.calls[0]).toEqual({
        argv: ["veracrypt", "--text", "--list"],
        options: { elevation: "", onLog: undefined },
      });
    });

    test("returns null when listing fails", async () => {
      const fake = createFakeRunner(() => null);
      expect(await resolveMountPoint(container, { runner: fake.runner })).toBeNull();
    });
  });
});
