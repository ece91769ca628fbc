import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, test, vi } from "vitest";
import { backupCommand } from "../../src/cli/commands/backup";
import { elevationCommand } from "../../src/cli/commands/elevation";
import { emptyCommand } from "../../src/cli/commands/empty";
import { mountCommand, unmountCommand } from "../../src/cli/commands/mount";
import { passwordCommand } from "../../src/cli/commands/password";
import { statusCommand } from "../../src/cli/commands/status";
import { FileSecretStore } from "../../src/secrets";

describe("CLI commands", () => {
  let tempDir: string;
  let configPath: string;
  let secretsPath: string;
  let ruleFile: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "vaultsync-cli-"));
    configPath = path.join(tempDir, "vaultsync.config.yaml");
    secretsPath = path.join(tempDir, "secrets.json");
    ruleFile = path.join(tempDir, "sudoers-vaultsync");

    await fs.writeFile(
      configPath,
      `
version: "1"
baseDir: ${tempDir}
elevation:
  enabled: false
  ruleFile: ${ruleFile}
secrets:
  path: ${secretsPath}
profiles:
  - id: main
    name: Main vault
    container: main.hc
    sources: [docs]
`,
    );
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("help", () => {
    test.each([
      ["backup", backupCommand],
      ["status", statusCommand],
      ["mount", mountCommand],
      ["unmount", unmountCommand],
      ["empty", emptyCommand],
      ["password", passwordCommand],
      ["elevation", elevationCommand],
    ])("%s --help exits 0", async (_name, command) => {
      expect(await command(["--help"])).toBe(0);
      expect(console.log).toHaveBeenCalled();
    });
  });

  describe("backup", () => {
    test("fails when the config file does not exist", async () => {
      const exitCode = await backupCommand(["-c", path.join(tempDir, "missing.yaml")]);
      expect(exitCode).toBe(1);
    });

    test("rejects an unknown network quality", async () => {
      const exitCode = await backupCommand(["-c", configPath, "--network", "excellent"]);
      expect(exitCode).toBe(1);
    });
  });

  describe("password", () => {
    test("--delete removes the stored container password", async () => {
      const store = new FileSecretStore(secretsPath);
      await store.set("main.hc", "test-secret");

      const exitCode = await passwordCommand(["-c", configPath, "--delete"]);

      expect(exitCode).toBe(0);
      expect(await store.get("main.hc")).toBeNull();
    });

    test("--delete succeeds when nothing is stored", async () => {
      const exitCode = await passwordCommand(["-c", configPath, "--delete"]);
      expect(exitCode).toBe(0);
    });

    test("fails for an unknown profile", async () => {
      const exitCode = await passwordCommand(["-c", configPath, "-p", "other", "--delete"]);
      expect(exitCode).toBe(1);
    });
  });

  describe("elevation", () => {
    test("requires exactly one of --install and --remove", async () => {
      expect(await elevationCommand(["-c", configPath])).toBe(1);
      expect(await elevationCommand(["-c", configPath, "--install", "--remove"])).toBe(1);
    });

    test("--remove does nothing when no rule exists", async () => {
      expect(await elevationCommand(["-c", configPath, "--remove"])).toBe(0);
    });

    test("--install does nothing when the rule already exists", async () => {
      await fs.writeFile(ruleFile, "%sudo ALL=(root) NOPASSWD: /usr/bin/veracrypt\n");

      expect(await elevationCommand(["-c", configPath, "--install"])).toBe(0);
      expect(await fs.readFile(ruleFile, "utf8")).toBe("%sudo ALL=(root) NOPASSWD: /usr/bin/veracrypt\n");
    });
  });
});
