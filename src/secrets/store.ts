/**
 * Secret storage for container passwords
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { errorCode, errorMessage, SecretStoreError } from "../utils";
import { decryptSecret, encryptSecret, KEY_ENV_NAME, loadOrCreateKey, normalizeKeyMaterial } from "./crypto";

export const KEY_FILE_NAME = ".secrets-key";

/**
 * Keyed by container identity. `get` resolves `null` when nothing is stored.
 */
export interface SecretStore {
  get(identity: string): Promise<string | null>;
  set(identity: string, secret: string): Promise<void>;
  delete(identity: string): Promise<boolean>;
}

interface SecretsFile {
  version: 1;
  updatedAt: string;
  values: Record<string, string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeValues(raw: unknown, key: Buffer): Record<string, string> {
  if (!isRecord(raw)) {
    return {};
  }
  const values: Record<string, string> = {};
  for (const [identity, value] of Object.entries(raw)) {
    if (typeof value === "string") {
      values[identity] = decryptSecret(value, key);
    }
  }
  return values;
}

export interface FileSecretStoreOptions {
  /** Key file; defaults to `.secrets-key` beside the store */
  keyPath?: string;
  /** Key material that takes precedence over the key file, normally `VAULTSYNC_SECRETS_KEY` */
  key?: string;
}

/**
 * JSON file readable only by the owner, every value encrypted with AES-256-GCM.
 * A missing file is an empty store. The key comes from `VAULTSYNC_SECRETS_KEY`
 * or a key file created on first use.
 */
export class FileSecretStore implements SecretStore {
  readonly keyPath: string;
  private readonly keyMaterial: string | undefined;
  private cachedKey: Buffer | null = null;

  constructor(
    readonly filePath: string,
    options: FileSecretStoreOptions = {},
  ) {
    this.keyPath = options.keyPath ?? path.join(path.dirname(filePath), KEY_FILE_NAME);
    const envKey = process.env[KEY_ENV_NAME]?.trim();
    this.keyMaterial = options.key ?? (envKey ? envKey : undefined);
  }

  async get(identity: string): Promise<string | null> {
    const values = await this.read();
    return values[identity] ?? null;
  }

  async set(identity: string, secret: string): Promise<void> {
    const values = await this.read();
    values[identity] = secret;
    await this.write(values);
  }

  async delete(identity: string): Promise<boolean> {
    const values = await this.read();
    if (!(identity in values)) {
      return false;
    }
    delete values[identity];
    await this.write(values);
    return true;
  }

  private async read(): Promise<Record<string, string>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        return {};
      }
      throw new SecretStoreError(`Could not read secret store ${this.filePath}: ${errorMessage(error)}`, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new SecretStoreError(`Secret store ${this.filePath} is not valid JSON`, error);
    }
    if (!isRecord(parsed)) {
      throw new SecretStoreError(`Secret store ${this.filePath} has an unexpected format`);
    }
    return normalizeValues(parsed.values, await this.key());
  }

  private async write(values: Record<string, string>): Promise<void> {
    const key = await this.key();
    const encrypted: Record<string, string> = {};
    for (const [identity, secret] of Object.entries(values)) {
      encrypted[identity] = encryptSecret(secret, key);
    }
    const payload: SecretsFile = {
      version: 1,
      updatedAt: new Date().toISOString(),
      values: encrypted,
    };

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
      await fs.writeFile(this.filePath, JSON.stringify(payload, null, 2), { encoding: "utf8", mode: 0o600 });
      // writeFile only applies the mode when it creates the file
      await fs.chmod(this.filePath, 0o600);
    } catch (error) {
      throw new SecretStoreError(`Could not write secret store ${this.filePath}: ${errorMessage(error)}`, error);
    }
  }

  private async key(): Promise<Buffer> {
    if (!this.cachedKey) {
      this.cachedKey =
        this.keyMaterial !== undefined ? normalizeKeyMaterial(this.keyMaterial) : await loadOrCreateKey(this.keyPath);
    }
    return this.cachedKey;
  }
}

/**
 * In-memory store, for one-off runs that should not touch disk.
 */
export class MemorySecretStore implements SecretStore {
  private readonly values = new Map<string, string>();

  async get(identity: string): Promise<string | null> {
    return this.values.get(identity) ?? null;
  }

  async set(identity: string, secret: string): Promise<void> {
    this.values.set(identity, secret);
  }

  async delete(identity: string): Promise<boolean> {
    return this.values.delete(identity);
  }
}
