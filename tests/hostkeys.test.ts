import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { chmodSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { packTar } from "modern-tar";
import { PermissionPolicyError } from "../src/lib/errors";
import { checkHostKeyPolicy, packHostKeys, readHostKeyArchive, type HostKey } from "../src/lib/hostkeys";
import { tempDir } from "./helpers";

const key = (name: string, mode: number, uid = 0, gid = 0): HostKey => ({
  name,
  uid,
  gid,
  mode,
  data: Buffer.from(`${name} material\n`),
});

const GOOD_KEYS = [key("ssh_host_rsa_key", 0o600), key("ssh_host_rsa_key.pub", 0o644)];

describe("checkHostKeyPolicy", () => {
  it("accepts root-owned keys at their usual modes", () => {
    for (const k of [...GOOD_KEYS, key("ssh_host_ed25519_key", 0o400), key("ssh_host_ed25519_key.pub", 0o600)]) {
      expect(() => checkHostKeyPolicy(k)).not.toThrow();
    }
  });

  it("rejects keys not owned by root", () => {
    expect(() => checkHostKeyPolicy(key("ssh_host_rsa_key", 0o600, 1000, 0))).toThrow(PermissionPolicyError);
    expect(() => checkHostKeyPolicy(key("ssh_host_rsa_key", 0o600, 0, 1000))).toThrow(
      "Host key 'ssh_host_rsa_key' must be owned by 0:0, not 0:1000"
    );
  });

  it("rejects private keys readable by anyone else", () => {
    expect(() => checkHostKeyPolicy(key("ssh_host_rsa_key", 0o640))).toThrow(PermissionPolicyError);
    expect(() => checkHostKeyPolicy(key("ssh_host_rsa_key", 0o677))).toThrow(
      "Host key 'ssh_host_rsa_key' has mode 0677, allowed at most 0700"
    );
  });

  it("rejects public keys that are writable or executable by others", () => {
    expect(() => checkHostKeyPolicy(key("ssh_host_rsa_key.pub", 0o677))).toThrow(PermissionPolicyError);
    expect(() => checkHostKeyPolicy(key("ssh_host_rsa_key.pub", 0o755))).toThrow(PermissionPolicyError);
    expect(() => checkHostKeyPolicy(key("ssh_host_rsa_key.pub", 0o4644))).toThrow(PermissionPolicyError);
  });
});

describe("host key archives", () => {
  let dir: string;
  let cleanup: () => void;
  beforeEach(() => ({ dir, cleanup } = tempDir()));
  afterEach(() => cleanup());

  const writeArchive = (bytes: Uint8Array, mode = 0o600) => {
    const path = join(dir, "keys.tar");
    writeFileSync(path, bytes);
    chmodSync(path, mode);
    return path;
  };

  it("reads back what packHostKeys wrote", async () => {
    const path = writeArchive(await packHostKeys(GOOD_KEYS, new Date(0)));
    const keys = await readHostKeyArchive(path);
    expect(keys.map((k) => [k.name, k.uid, k.gid, k.mode, Buffer.from(k.data).toString()])).toEqual([
      ["ssh_host_rsa_key", 0, 0, 0o600, "ssh_host_rsa_key material\n"],
      ["ssh_host_rsa_key.pub", 0, 0, 0o644, "ssh_host_rsa_key.pub material\n"],
    ]);
  });

  it("refuses an archive file others can read", async () => {
    const path = writeArchive(await packHostKeys(GOOD_KEYS, new Date(0)), 0o644);
    await expect(readHostKeyArchive(path)).rejects.toThrow(PermissionPolicyError);
  });

  it("refuses a member that fails the policy", async () => {
    const path = writeArchive(await packHostKeys([GOOD_KEYS[0], key("ssh_host_rsa_key.pub", 0o677)], new Date(0)));
    await expect(readHostKeyArchive(path)).rejects.toThrow("Host key 'ssh_host_rsa_key.pub' has mode 0677");
  });

  it("refuses directories and nested names", async () => {
    const withDir = writeArchive(
      await packTar([{ header: { name: "ssh", size: 0, type: "directory", mode: 0o700, uid: 0, gid: 0 } }])
    );
    await expect(readHostKeyArchive(withDir)).rejects.toThrow(PermissionPolicyError);

    const nested = writeArchive(
      await packTar([
        { header: { name: "etc/ssh_host_rsa_key", size: 4, type: "file", mode: 0o600, uid: 0, gid: 0 }, body: "PRIV" },
      ])
    );
    await expect(readHostKeyArchive(nested)).rejects.toThrow("is not a plain file name");
  });
});
