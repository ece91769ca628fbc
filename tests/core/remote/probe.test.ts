import { describe, expect, test, vi } from "vitest";
import {
  attemptRemoteMount,
  ensureRemoteDirectory,
  probeRemotePath,
  type RemoteOpsContext,
  waitForRemote,
} from "../../../src/core/remote/probe";
import type { CommandRunner, TimeoutProfile } from "../../../src/types";
import { CancelledError } from "../../../src/utils/errors";
import { createFakeRunner, type FakeHandler } from "../../helpers/fake-runner";

const REMOTE = "/run/user/1000/gvfs/google-drive:host=example.com,user=alice";
const FAST: TimeoutProfile = { ioTimeoutMs: 50, cmdTimeoutMs: 50, probeTimeoutMs: 50 };

function context(runner: CommandRunner, overrides: Partial<RemoteOpsContext> = {}) {
  const logs: string[] = [];
  const ctx: RemoteOpsContext = {
    runner,
    timeouts: FAST,
    onLog: (m) => logs.push(m),
    delay: vi.fn(async () => {}),
    ...overrides,
  };
  return { ctx, logs };
}

const hang: FakeHandler = () => new Promise(() => {});

describe("remote probe", () => {
  describe("probeRemotePath", () => {
    test("runs test -d on the path", async () => {
      const fake = createFakeRunner();
      const { ctx } = context(fake.runner);

      expect(await probeRemotePath(REMOTE, ctx)).toBe(true);
      expect(fake.calls[0]?.argv).toEqual(["test", "-d", REMOTE]);
    });

    test("is false when the path is missing", async () => {
      const { ctx } = context(createFakeRunner(() => null).runner);
      expect(await probeRemotePath(REMOTE, ctx)).toBe(false);
    });

    test("treats a hung probe as inaccessible", async () => {
      const { ctx, logs } = context(createFakeRunner(hang).runner);

      expect(await probeRemotePath(REMOTE, ctx)).toBe(false);
      expect(logs).toEqual([
        `Probe of ${REMOTE} is not responding: Operation 'test -d ${REMOTE}' timed out after 0.05s`,
      ]);
    });
  });

  describe("attemptRemoteMount", () => {
    test("mounts the URI derived from the path", async () => {
      const fake = createFakeRunner();
      const { ctx } = context(fake.runner);

      expect(await attemptRemoteMount(REMOTE, ctx)).toBe(true);
      expect(fake.calls[0]?.argv).toEqual(["gio", "mount", "google-drive://alice@example.com/"]);
    });

    test("skips paths without an account", async () => {
      const fake = createFakeRunner();
      const { ctx, logs } = context(fake.runner);

      expect(await attemptRemoteMount("/mnt/usb", ctx)).toBe(false);
      expect(fake.calls).toHaveLength(0);
      expect(logs).toEqual(["Skipping auto-mount: No mount descriptor found in path: /mnt/usb"]);
    });

    test("is false when the mount command fails or hangs", async () => {
      expect(await attemptRemoteMount(REMOTE, context(createFakeRunner(() => null).runner).ctx)).toBe(false);

      const { ctx, logs } = context(createFakeRunner(hang).runner);
      expect(await attemptRemoteMount(REMOTE, ctx)).toBe(false);
      expect(logs).toContain("Remote mount attempt timed out");
    });

    test("raises when cancelled", async () => {
      const controller = new AbortController();
      controller.abort();
      const { ctx } = context(createFakeRunner().runner, { signal: controller.signal });

      await expect(attemptRemoteMount(REMOTE, ctx)).rejects.toBeInstanceOf(CancelledError);
    });
  });

  describe("waitForRemote", () => {
    test("polls until the path answers", async () => {
      let probes = 0;
      const fake = createFakeRunner(() => (++probes >= 3 ? "" : null));
      const delay = vi.fn(async () => {});
      const { ctx } = context(fake.runner, { delay });

      expect(await waitForRemote(REMOTE, ctx)).toBe(true);
      expect(probes).toBe(3);
      expect(delay).toHaveBeenCalledTimes(2);
      expect(delay).toHaveBeenCalledWith(1000);
    });

    test("gives up after the last attempt without a final delay", async () => {
      const fake = createFakeRunner(() => null);
      const delay = vi.fn(async () => {});
      const { ctx, logs } = context(fake.runner, { delay });

      expect(await waitForRemote(REMOTE, ctx)).toBe(false);
      expect(fake.calls).toHaveLength(5);
      expect(delay).toHaveBeenCalledTimes(4);
      expect(logs[0]).toBe("Path not ready yet, retrying in 1 second(s)... (1/4)");
    });
  });

  describe("ensureRemoteDirectory", () => {
    test("creates the directory with mkdir -p", async () => {
      const fake = createFakeRunner();
      const { ctx } = context(fake.runner);

      expect(await ensureRemoteDirectory(`${REMOTE}/Backups`, ctx)).toEqual({ ok: true });
      expect(fake.calls[0]?.argv).toEqual(["mkdir", "-p", `${REMOTE}/Backups`]);
    });

    test("reports failures and timeouts with a reason", async () => {
      const failed = await ensureRemoteDirectory("/r/Backups", context(createFakeRunner(() => null).runner).ctx);
      expect(failed).toEqual({ ok: false, reason: "Could not create remote directory: /r/Backups" });

      const hung = await ensureRemoteDirectory("/r/Backups", context(createFakeRunner(hang).runner).ctx);
      expect(hung).toEqual({
        ok: false,
        reason: "Could not create remote directory: /r/Backups\nError: Operation 'mkdir -p /r/Backups' timed out after 0.05s",
      });
    });
  });
});
