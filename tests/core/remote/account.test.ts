import { describe, expect, test } from "vitest";
import { parseRemoteAccount } from "../../../src/core/remote/account";

describe("parseRemoteAccount", () => {
  test("builds the account from user and host", () => {
    expect(parseRemoteAccount("/run/user/1000/gvfs/google-drive:host=example.com,user=alice/Backups")).toEqual({
      ok: true,
      scheme: "google-drive",
      account: "alice@example.com",
      uri: "google-drive://alice@example.com/",
    });
  });

  test("keeps a user that is already an address", () => {
    const parsed = parseRemoteAccount("/run/user/1000/gvfs/google-drive:host=example.com,user=alice%40example.org");
    expect(parsed).toMatchObject({ ok: true, account: "alice@example.org", uri: "google-drive://alice@example.org/" });
  });

  test("accepts parameters in any order, with extras", () => {
    const parsed = parseRemoteAccount("/gvfs/sftp:user=bob,port=2222,host=files.example.com");
    expect(parsed).toMatchObject({ ok: true, scheme: "sftp", account: "bob@files.example.com" });
  });

  test("rejects a descriptor without a user", () => {
    expect(parseRemoteAccount("/gvfs/google-drive:host=example.com")).toEqual({
      ok: false,
      reason: "Could not extract account from 'google-drive:host=example.com' (user: none, host: example.com)",
    });
  });

  test("rejects malformed parameter lists", () => {
    expect(parseRemoteAccount("/gvfs/google-drive:host")).toEqual({
      ok: false,
      reason: "Malformed mount descriptor 'google-drive:host'",
    });
  });

  test("rejects paths with no descriptor", () => {
    expect(parseRemoteAccount("/mnt/backup-drive")).toEqual({
      ok: false,
      reason: "No mount descriptor found in path: /mnt/backup-drive",
    });
  });
});
