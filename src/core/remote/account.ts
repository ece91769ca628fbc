/**
 * Recover the account behind a FUSE mount path such as
 * `/run/user/1000/gvfs/google-drive:host=example.com,user=alice/Backups`.
 */

export type RemoteAccount =
  | { ok: true; scheme: string; account: string; uri: string }
  | { ok: false; reason: string };

const DESCRIPTOR = /^([a-z][a-z0-9+.-]*):(.+)$/i;

function parseParams(list: string): Map<string, string> | null {
  const params = new Map<string, string>();
  for (const pair of list.split(",")) {
    const eq = pair.indexOf("=");
    if (eq <= 0) {
      return null;
    }
    let value: string;
    try {
      value = decodeURIComponent(pair.slice(eq + 1));
    } catch {
      return null;
    }
    params.set(pair.slice(0, eq), value);
  }
  return params;
}

/**
 * Find the first `<scheme>:<key>=<value>,...` segment of the path and build the
 * mount URI from its `user` and `host`. Nothing is guessed: a path without a
 * complete descriptor is rejected with a reason.
 */
export function parseRemoteAccount(remotePath: string): RemoteAccount {
  for (const segment of remotePath.split("/")) {
    const match = DESCRIPTOR.exec(segment);
    const scheme = match?.[1];
    const paramList = match?.[2];
    if (scheme === undefined || paramList === undefined) continue;

    const params = parseParams(paramList);
    if (!params) {
      return { ok: false, reason: `Malformed mount descriptor '${segment}'` };
    }

    const user = params.get("user");
    const host = params.get("host");
    if (!user || !host) {
      return {
        ok: false,
        reason: `Could not extract account from '${segment}' (user: ${user ?? "none"}, host: ${host ?? "none"})`,
      };
    }

    const account = user.includes("@") ? user : `${user}@${host}`;
    return { ok: true, scheme, account, uri: `${scheme}://${account}/` };
  }

  return { ok: false, reason: `No mount descriptor found in path: ${remotePath}` };
}
