import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import {
  ConfigError,
  findAndLoadConfig,
  findConfigFile,
  loadConfig,
  parseConfig,
  userConfigDir,
} from "../../src/config/loader";
import { buildRunConfiguration, findProfile, resolveProfile } from "../../src/config/resolver";
import type { VaultsyncConfig } from "../../src/types";

const MINIMAL_YAML = `
version: "1"
profiles:
  - id: main
    name: Main vault
    container: Vaults/main.hc
    sources: [Documents, /srv/shared]
`;

describe("config loader", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "vaultsync-config-"));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeConfig(name: string, content: string): Promise<string> {
    const configPath = path.join(tempDir, name);
    await fs.writeFile(configPath, content);
    return configPath;
  }

  describe("loadConfig", () => {
    test("loads YAML and fills defaults", async () => {
      const configPath = await writeConfig("minimal.yaml", MINIMAL_YAML);

      const config = await loadConfig(configPath);

      expect(config.version).toBe("1");
      expect(config.baseDir).toBe(os.homedir());
      expect(config.networkQuality).toBe("good");
      expect(config.remote).toEqual({ backupDir: "Backups", autoMount: true, required: false, path: null });
      expect(config.elevation).toEqual({ enabled: true, ruleFile: "/etc/sudoers.d/vaultsync" });
      expect(config.secrets.path).toBe(path.join(os.homedir(), ".config/vaultsync/secrets.json"));
    });

    test("loads JSON and resolves relative paths against the config directory", async () => {
      const configPath = await writeConfig(
        "relative.json",
        JSON.stringify({
          version: "1",
          baseDir: "data",
          networkQuality: "poor",
          remote: { path: "/run/user/1000/gvfs/google-drive:host=example.com,user=alice", autoMount: false },
          secrets: { path: "secrets.json" },
          profiles: [{ id: "main", name: "Main", container: "main.hc", sources: ["docs"] }],
        }),
      );

      const config = await loadConfig(configPath);

      expect(config.baseDir).toBe(path.join(tempDir, "data"));
      expect(config.networkQuality).toBe("poor");
      expect(config.remote).toEqual({
        path: "/run/user/1000/gvfs/google-drive:host=example.com,user=alice",
        backupDir: "Backups",
        autoMount: false,
        required: false,
      });
      expect(config.secrets.path).toBe(path.join(tempDir, "secrets.json"));
    });

    test("throws ConfigError for a missing file", async () => {
      const missing = path.join(tempDir, "missing.yaml");
      await expect(loadConfig(missing)).rejects.toThrow(`Config file not found: ${missing}`);
    });

    test("throws ConfigError for invalid YAML", async () => {
      const configPath = await writeConfig("broken.yaml", "version: [1\n");
      await expect(loadConfig(configPath)).rejects.toBeInstanceOf(ConfigError);
    });

    test("rejects unsupported extensions", async () => {
      const configPath = await writeConfig("config.toml", 'version = "1"');
      await expect(loadConfig(configPath)).rejects.toThrow(
        "Unsupported config file format: .toml. Use .yaml, .yml, or .json",
      );
    });
  });

  describe("validation", () => {
    const load = (content: string) => parseConfig(content, ".yaml", path.join(tempDir, "inline.yaml"));

    test("requires a version", () => {
      expect(() => load("profiles: []")).toThrow("Config must have a 'version' field");
    });

    test("requires at least one profile", () => {
      expect(() => load('version: "1"')).toThrow("Config must have at least one entry in 'profiles'");
    });

    test("rejects unknown network qualities", () => {
      expect(() => load(`${MINIMAL_YAML}networkQuality: fast\n`)).toThrow(
        "networkQuality must be one of: good, poor, terrible",
      );
    });

    test("rejects duplicate profile ids", () => {
      const content = `version: "1"
profiles:
  - { id: main, name: A, container: a.hc, sources: [] }
  - { id: main, name: B, container: b.hc, sources: [] }
`;
      expect(() => load(content)).toThrow('profiles[1].id "main" is used more than once');
    });

    test("rejects non-string sources", () => {
      const content = `version: "1"
profiles:
  - { id: main, name: A, container: a.hc, sources: [42] }
`;
      expect(() => load(content)).toThrow("profiles.main.sources must contain only non-empty strings");
    });

    test("keeps the backup directory inside the remote", () => {
      expect(() => load(`${MINIMAL_YAML}remote:\n  backupDir: ../elsewhere\n`)).toThrow(
        "remote.backupDir must be a relative path inside remote.path",
      );
    });

    test("requires a remote path when the remote is required", () => {
      expect(() => load(`${MINIMAL_YAML}remote:\n  required: true\n`)).toThrow(
        "remote.path must be set when remote.required is true",
      );
    });

    test("treats an empty remote path as no remote", () => {
      expect(load(`${MINIMAL_YAML}remote:\n  path:\n`).remote.path).toBeNull();
    });
  });

  describe("findConfigFile", () => {
    test("prefers the working directory", async () => {
      const cwd = path.join(tempDir, "project");
      const home = path.join(tempDir, "home");
      await fs.mkdir(cwd, { recursive: true });
      await fs.mkdir(userConfigDir(home), { recursive: true });
      await fs.writeFile(path.join(cwd, "vaultsync.config.yml"), MINIMAL_YAML);
      await fs.writeFile(path.join(userConfigDir(home), "vaultsync.config.yaml"), MINIMAL_YAML);

      expect(findConfigFile(cwd, home)).toBe(path.join(cwd, "vaultsync.config.yml"));
    });

    test("falls back to the user config directory", async () => {
      const cwd = path.join(tempDir, "empty-project");
      const home = path.join(tempDir, "home-only");
      await fs.mkdir(cwd, { recursive: true });
      await fs.mkdir(userConfigDir(home), { recursive: true });
      await fs.writeFile(path.join(userConfigDir(home), "vaultsync.config.yaml"), MINIMAL_YAML);

      expect(findConfigFile(cwd, home)).toBe(path.join(home, ".config", "vaultsync", "vaultsync.config.yaml"));
    });

    test("returns null when nothing is found", () => {
      expect(findConfigFile(path.join(tempDir, "nowhere"), path.join(tempDir, "nobody"))).toBeNull();
    });
  });

  test("findAndLoadConfig loads an explicit path", async () => {
    const configPath = await writeConfig("explicit.yaml", MINIMAL_YAML);
    const config = await findAndLoadConfig(configPath);
    expect(config.profiles).toHaveLength(1);
  });
});

describe("config resolver", () => {
  const config: VaultsyncConfig = {
    version: "1",
    baseDir: "/home/alice",
    networkQuality: "terrible",
    remote: { path: "/mnt/remote", backupDir: "Backups", autoMount: true, required: true },
    elevation: { enabled: false, ruleFile: "/etc/sudoers.d/vaultsync" },
    secrets: { path: "/home/alice/.config/vaultsync/secrets.json" },
    profiles: [
      { id: "main", name: "Main", container: "Vaults/main.hc", sources: ["Documents", "/srv/shared"] },
      { id: "work", name: "Work", container: "/data/work.hc", sources: [] },
    ],
  };

  test("resolveProfile makes paths absolute and keeps the configured identity", () => {
    const main = config.profiles[0];
    if (!main) throw new Error("fixture");

    expect(resolveProfile(config, main)).toEqual({
      id: "main",
      name: "Main",
      containerIdentity: "Vaults/main.hc",
      container: "/home/alice/Vaults/main.hc",
      sources: ["/home/alice/Documents", "/srv/shared"],
    });
  });

  test("findProfile by id, or null when a choice is needed", () => {
    expect(findProfile(config, "work")?.container).toBe("/data/work.hc");
    expect(findProfile(config)).toBeNull();
    expect(findProfile({ ...config, profiles: config.profiles.slice(0, 1) })?.id).toBe("main");
    expect(() => findProfile(config, "nope")).toThrow('Profile "nope" not found. Available: main, work');
  });

  test("buildRunConfiguration snapshots the run settings", () => {
    expect(buildRunConfiguration(config)).toEqual({
      remotePath: "/mnt/remote",
      remoteBackupDir: "Backups",
      networkQuality: "terrible",
      autoMountRemote: true,
      requireRemote: true,
    });
  });
});
