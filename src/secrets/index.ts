/**
 * Secret store exports
 */

export { decryptSecret, encryptSecret, isEncryptedSecret, KEY_ENV_NAME } from "./crypto";
export {
  FileSecretStore,
  type FileSecretStoreOptions,
  KEY_FILE_NAME,
  MemorySecretStore,
  type SecretStore,
} from "./store";
