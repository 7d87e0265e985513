import { readFile, stat } from "node:fs/promises";
import { packTar, unpackTar, type TarEntry } from "modern-tar";
import { PermissionPolicyError } from "./errors";

export interface HostKey {
  name: string;
  uid: number;
  gid: number;
  mode: number;
  data: Uint8Array;
}

// Bits that must be clear: private keys at most 0700, public keys at most 0644.
const PRIVATE_FORBIDDEN = 0o7077;
const PUBLIC_FORBIDDEN = 0o7133;

export const isPublicKeyName = (name: string) => name.endsWith(".pub");

/** Throws unless key is root-owned and no more permissive than its kind allows. */
export function checkHostKeyPolicy(key: Pick<HostKey, "name" | "uid" | "gid" | "mode">): void {
  if (key.uid !== 0 || key.gid !== 0) {
    throw new PermissionPolicyError(`Host key '${key.name}' must be owned by 0:0, not ${key.uid}:${key.gid}`);
  }
  const forbidden = isPublicKeyName(key.name) ? PUBLIC_FORBIDDEN : PRIVATE_FORBIDDEN;
  if (key.mode & forbidden) {
    throw new PermissionPolicyError(
      `Host key '${key.name}' has mode ${key.mode.toString(8).padStart(4, "0")}, ` +
        `allowed at most ${(0o7777 & ~forbidden).toString(8).padStart(4, "0")}`
    );
  }
}

/**
 * Read and validate a host-key archive. The archive file itself must not be
 * accessible by group or others; every member must be a plain file with a
 * bare name that passes checkHostKeyPolicy.
 */
export async function readHostKeyArchive(path: string): Promise<HostKey[]> {
  const st = await stat(path);
  if (st.mode & 0o077) {
    throw new PermissionPolicyError(
      `Host key archive '${path}' is accessible by group/others (mode ${(st.mode & 0o777).toString(8)})`
    );
  }

  const entries = await unpackTar(await readFile(path));
  const keys: HostKey[] = [];
  for (const { header, data } of entries) {
    const type = header.type ?? "file";
    if (type !== "file") {
      throw new PermissionPolicyError(`Host key archive member '${header.name}' is a ${type}, not a file`);
    }
    if (!header.name || header.name.includes("/") || header.name === "." || header.name === "..") {
      throw new PermissionPolicyError(`Host key archive member '${header.name}' is not a plain file name`);
    }
    const key: HostKey = {
      name: header.name,
      uid: header.uid ?? -1,
      gid: header.gid ?? -1,
      mode: header.mode ?? 0o7777,
      data,
    };
    checkHostKeyPolicy(key);
    keys.push(key);
  }
  return keys;
}

/** Pack keys into a tar archive, stamping every member with mtime. */
export async function packHostKeys(keys: HostKey[], mtime: Date): Promise<Uint8Array> {
  const entries: TarEntry[] = keys.map((k) => ({
    header: { name: k.name, size: k.data.length, mode: k.mode, uid: k.uid, gid: k.gid, mtime, type: "file" },
    body: k.data,
  }));
  return packTar(entries);
}
