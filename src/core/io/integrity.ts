/**
 * Chunked copy and SHA-256 verification with per-operation watchdog bounds
 */

import { createHash } from "node:crypto";
import { type FileHandle, open, rm, stat } from "node:fs/promises";
import type { LogSink } from "../../types";
import { CancelledError, createLogger, errorMessage, formatBytes, IOFailure } from "../../utils";
import { throwIfCancelled } from "../cancellation";
import { runWithTimeout } from "./watchdog";

const log = createLogger("integrity");

export const DEFAULT_CHUNK_SIZE = 4 * 1024 * 1024;

export interface ChunkedIOOptions {
  signal?: AbortSignal;
  chunkSize?: number;
  onStatus?: (message: string) => void;
  onProgress?: (percent: number) => void;
  onLog?: LogSink;
}

export interface GuardedIOOptions extends ChunkedIOOptions {
  /** Bound for each open/read/write/close on the remote side; `null` waits forever */
  ioTimeoutMs: number | null;
}

function reportProgress(onProgress: ChunkedIOOptions["onProgress"], done: number, total: number): void {
  if (onProgress && total > 0) {
    onProgress(Math.floor((done * 100) / total));
  }
}

function wrapFailure(error: unknown, message: string, filePath: string, remote: boolean): Error {
  if (error instanceof CancelledError || error instanceof IOFailure) {
    return error;
  }
  return new IOFailure(message, filePath, remote, error);
}

async function closeHandle(handle: FileHandle): Promise<void> {
  await handle.close();
}

async function closeGuarded(
  handle: FileHandle,
  ioTimeoutMs: number | null,
  onLog: LogSink | undefined,
  warning: string,
): Promise<void> {
  try {
    await runWithTimeout("close", () => handle.close(), ioTimeoutMs);
  } catch (error) {
    // the primary error, if any, matters more than a failed close
    const message = `${warning}: ${errorMessage(error)}`;
    onLog?.(message);
    log.debug(message);
  }
}

async function writeFully(handle: FileHandle, data: Buffer): Promise<void> {
  let offset = 0;
  while (offset < data.length) {
    const { bytesWritten } = await handle.write(data, offset, data.length - offset, null);
    offset += bytesWritten;
  }
}

/**
 * Hash a file on a trusted local disk. No watchdog; cancellation is checked
 * before every chunk.
 */
export async function digestLocalFile(filePath: string, options: ChunkedIOOptions = {}): Promise<string> {
  const { signal, chunkSize = DEFAULT_CHUNK_SIZE, onStatus, onLog } = options;
  onStatus?.("Verifying local file integrity...");

  const hash = createHash("sha256");
  let handle: FileHandle | undefined;
  try {
    handle = await open(filePath, "r");
    const buffer = Buffer.alloc(chunkSize);
    for (;;) {
      throwIfCancelled(signal, "Backup cancelled by user during local file hashing.");
      const { bytesRead } = await handle.read(buffer, 0, chunkSize, null);
      if (bytesRead === 0) break;
      hash.update(buffer.subarray(0, bytesRead));
    }
    return hash.digest("hex");
  } catch (error) {
    throw wrapFailure(error, "Failed during local file hashing", filePath, false);
  } finally {
    if (handle) {
      await closeGuarded(handle, null, onLog, `Warning: failed to close ${filePath}`);
    }
  }
}

/**
 * Hash a file on the remote mount. Open, every read and close are each bounded
 * by `ioTimeoutMs`.
 */
export async function digestRemoteFile(filePath: string, options: GuardedIOOptions): Promise<string> {
  const { signal, ioTimeoutMs, chunkSize = DEFAULT_CHUNK_SIZE, onStatus, onProgress, onLog } = options;
  onStatus?.("Verifying remote file integrity...");

  const hash = createHash("sha256");
  let handle: FileHandle | undefined;
  try {
    throwIfCancelled(signal);
    const totalSize = await runWithTimeout(`stat ${filePath}`, async () => (await stat(filePath)).size, ioTimeoutMs);
    const opened = await runWithTimeout(`open ${filePath}`, () => open(filePath, "r"), ioTimeoutMs, {
      onAbandoned: closeHandle,
    });
    handle = opened;
    throwIfCancelled(signal);

    let processed = 0;
    for (;;) {
      // fresh buffer per chunk: an abandoned read may still fill the previous one
      const buffer = Buffer.alloc(chunkSize);
      const { bytesRead } = await runWithTimeout(
        `read ${filePath}`,
        () => opened.read(buffer, 0, chunkSize, null),
        ioTimeoutMs,
      );
      throwIfCancelled(signal, "Backup cancelled by user during hashing.");
      if (bytesRead === 0) break;
      hash.update(buffer.subarray(0, bytesRead));
      processed += bytesRead;
      reportProgress(onProgress, processed, totalSize);
    }
    return hash.digest("hex");
  } catch (error) {
    throw wrapFailure(error, "Remote file error during verification", filePath, true);
  } finally {
    if (handle) {
      await closeGuarded(handle, ioTimeoutMs, onLog, "Warning: failed to close remote file handle for hashing");
    }
  }
}

/**
 * Copy a local file to the remote mount chunk by chunk. Local reads are
 * unguarded; the remote open, every write and the close are bounded by
 * `ioTimeoutMs`. Progress is reset to 0 when the copy completes.
 */
export async function copyToRemote(srcPath: string, dstPath: string, options: GuardedIOOptions): Promise<void> {
  const { signal, ioTimeoutMs, chunkSize = DEFAULT_CHUNK_SIZE, onStatus, onProgress, onLog } = options;
  onStatus?.("Copying container to remote... (this may take a while)");

  let source: FileHandle | undefined;
  let destination: FileHandle | undefined;
  try {
    throwIfCancelled(signal);

    let totalSize: number;
    try {
      totalSize = (await stat(srcPath)).size;
      source = await open(srcPath, "r");
    } catch (error) {
      throw new IOFailure("Could not read the local container", srcPath, false, error);
    }
    onLog?.(`Copying ${formatBytes(totalSize)} to ${dstPath}`);

    const out = await runWithTimeout(`open ${dstPath}`, () => open(dstPath, "w"), ioTimeoutMs, {
      onAbandoned: closeHandle,
    });
    destination = out;

    let copied = 0;
    for (;;) {
      const buffer = Buffer.alloc(chunkSize);
      let bytesRead: number;
      try {
        ({ bytesRead } = await source.read(buffer, 0, chunkSize, null));
      } catch (error) {
        throw new IOFailure("Could not read the local container", srcPath, false, error);
      }
      throwIfCancelled(signal, "Backup cancelled by user during file copy.");
      if (bytesRead === 0) break;

      const chunk = buffer.subarray(0, bytesRead);
      await runWithTimeout(`write ${dstPath}`, () => writeFully(out, chunk), ioTimeoutMs);
      copied += bytesRead;
      reportProgress(onProgress, copied, totalSize);
    }

    onProgress?.(0);
  } catch (error) {
    throw wrapFailure(error, "Remote file error during copy", dstPath, true);
  } finally {
    if (source) {
      await closeGuarded(source, null, onLog, `Warning: failed to close ${srcPath}`);
    }
    if (destination) {
      await closeGuarded(destination, ioTimeoutMs, onLog, "Warning: failed to close destination file handle");
    }
  }
}

/**
 * Delete a file on the remote mount, bounded by `ioTimeoutMs`.
 */
export async function removeRemoteFile(filePath: string, ioTimeoutMs: number | null): Promise<void> {
  try {
    await runWithTimeout(`unlink ${filePath}`, () => rm(filePath), ioTimeoutMs);
  } catch (error) {
    throw wrapFailure(error, "Could not delete remote file", filePath, true);
  }
}
