/**
 * AES-256-GCM encryption for stored secrets
 */

import { createCipheriv, createDecipheriv, createHash, randomBytes } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { errorCode, errorMessage, SecretStoreError } from "../utils";

export const KEY_ENV_NAME = "VAULTSYNC_SECRETS_KEY";
export const ENCRYPTION_PREFIX = "enc:v1:";

const CIPHER_ALGO = "aes-256-gcm";
const IV_BYTES = 12;
const KEY_BYTES = 32;

/**
 * Turn configured key material into a 32-byte key: base64 of exactly 32 bytes
 * is used as is, anything else is hashed.
 */
export function normalizeKeyMaterial(raw: string): Buffer {
  const trimmed = raw.trim();
  const decoded = Buffer.from(trimmed, "base64");
  if (decoded.length === KEY_BYTES && decoded.toString("base64").replace(/=+$/, "") === trimmed.replace(/=+$/, "")) {
    return decoded;
  }
  return createHash("sha256").update(trimmed, "utf8").digest();
}

/**
 * Read the key file, creating it with a fresh random key (mode 0600) when absent.
 */
export async function loadOrCreateKey(keyPath: string): Promise<Buffer> {
  try {
    return normalizeKeyMaterial(await fs.readFile(keyPath, "utf8"));
  } catch (error) {
    if (errorCode(error) !== "ENOENT") {
      throw new SecretStoreError(`Could not read secrets key ${keyPath}: ${errorMessage(error)}`, error);
    }
  }

  const generated = randomBytes(KEY_BYTES);
  try {
    await fs.mkdir(path.dirname(keyPath), { recursive: true, mode: 0o700 });
    // wx: never replace a key another process just created
    await fs.writeFile(keyPath, generated.toString("base64"), { encoding: "utf8", mode: 0o600, flag: "wx" });
  } catch (error) {
    if (errorCode(error) === "EEXIST") {
      return loadOrCreateKey(keyPath);
    }
    throw new SecretStoreError(`Could not create secrets key ${keyPath}: ${errorMessage(error)}`, error);
  }
  return generated;
}

export function isEncryptedSecret(value: string): boolean {
  return value.startsWith(ENCRYPTION_PREFIX);
}

export function encryptSecret(value: string, key: Buffer): string {
  if (value.length === 0 || isEncryptedSecret(value)) {
    return value;
  }

  const iv = randomBytes(IV_BYTES);
  const cipher = createCipheriv(CIPHER_ALGO, key, iv);
  const encrypted = Buffer.concat([cipher.update(value, "utf8"), cipher.final()]);
  const tag = cipher.getAuthTag();

  return `${ENCRYPTION_PREFIX}${iv.toString("base64")}.${tag.toString("base64")}.${encrypted.toString("base64")}`;
}

/**
 * Decrypt an `enc:v1:` value. Values without the prefix are returned unchanged;
 * a damaged value or the wrong key raises {@link SecretStoreError}.
 */
export function decryptSecret(value: string, key: Buffer): string {
  if (!isEncryptedSecret(value)) {
    return value;
  }

  const [ivRaw, tagRaw, encryptedRaw, ...rest] = value.slice(ENCRYPTION_PREFIX.length).split(".");
  if (ivRaw === undefined || tagRaw === undefined || encryptedRaw === undefined || rest.length > 0) {
    throw new SecretStoreError("Stored secret is malformed");
  }

  try {
    const decipher = createDecipheriv(CIPHER_ALGO, key, Buffer.from(ivRaw, "base64"));
    decipher.setAuthTag(Buffer.from(tagRaw, "base64"));
    const decrypted = Buffer.concat([decipher.update(Buffer.from(encryptedRaw, "base64")), decipher.final()]);
    return decrypted.toString("utf8");
  } catch (error) {
    throw new SecretStoreError("Stored secret could not be decrypted with the current key", error);
  }
}
