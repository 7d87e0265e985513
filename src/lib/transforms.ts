import { chmod, open, readFile, writeFile } from "node:fs/promises";
import { GUEST, KEYGEN_COMMAND, PI_GID, PI_UID, TOOLS, UDEV_RULES } from "./config";
import { DebugFs } from "./debugfs";
import { CommandError, IntegrityError, KeyPolicyError, NotFoundError, UsageError } from "./errors";
import type { Executor } from "./executor";
import { packHostKeys, readHostKeyArchive, type HostKey } from "./hostkeys";
import { INFO, WARN, logger } from "./log";
import { withRootPartition } from "./partition";
import { resolveSuffix, type SizeInput } from "./size";

const trace = logger("transform");

// Guest files are handled as bytes; latin1 maps each byte to one char and back.
const decode = (b: Uint8Array) => Buffer.from(b).toString("latin1");
const encode = (s: string) => Buffer.from(s, "latin1");

/** Prefix every active (non-empty, non-comment) line with '#'. */
export function commentOutLines(text: string): string {
  return text
    .split("\n")
    .map((line) => (line !== "" && !line.startsWith("#") ? "#" + line : line))
    .join("\n");
}

/** Drop the leading run of '#' from every line. */
export function uncommentLines(text: string): string {
  return text
    .split("\n")
    .map((line) => line.replace(/^#+/, ""))
    .join("\n");
}

export function stripLinesContaining(text: string, needle: string): string {
  return text
    .split("\n")
    .filter((line) => !line.includes(needle))
    .join("\n");
}

/** Append key unless its exact bytes are already present. */
export function appendKey(existing: Uint8Array, key: Uint8Array): Buffer {
  const current = Buffer.from(existing);
  if (current.includes(Buffer.from(key))) return current;
  const separator = current.length && current[current.length - 1] !== 0x0a ? Buffer.from("\n") : Buffer.alloc(0);
  return Buffer.concat([current, separator, key]);
}

export async function readPublicKey(path: string): Promise<Buffer> {
  if (!path) throw new UsageError("Empty public key path");
  const key = await readFile(path);
  if (!key.toString("latin1").trim()) throw new KeyPolicyError(`Public key file '${path}' is empty`);
  if (key.includes("PRIVATE KEY")) {
    throw new KeyPolicyError(`'${path}' holds a private key; pass the .pub file instead`);
  }
  return key;
}

export type PrepOptions = {
  source: string;
  destination?: string;
  growRoot?: SizeInput;
  addPublicKey?: string;
  setHostKeys?: string;
  keepRoot?: boolean;
  workDir?: string;
};

export type UnprepOptions = {
  source: string;
  destination?: string;
  keepRoot?: boolean;
  workDir?: string;
};

export type ExtractKind = "hostkeys";

export type ExtractOptions = {
  source: string;
  kind: ExtractKind;
  output: string;
  keepRoot?: boolean;
  workDir?: string;
  /** Timestamp written to every archive member; defaults to now. */
  now?: Date;
};

/** Make an image bootable under the emulator. */
export async function prep(exec: Executor, options: PrepOptions): Promise<void> {
  // Every input is checked before the image is opened.
  const growth = resolveSuffix(options.growRoot);
  const publicKey = options.addPublicKey !== undefined ? await readPublicKey(options.addPublicKey) : undefined;
  const hostKeys = options.setHostKeys !== undefined ? await readHostKeyArchive(options.setHostKeys) : undefined;

  await withRootPartition(
    exec,
    options.source,
    async (rootPath) => {
      if (growth !== undefined) {
        await growFile(rootPath, growth);
        await resizeFilesystem(exec, rootPath);
      }

      const fs = new DebugFs(exec, rootPath);
      INFO(`Installing ${GUEST.udevRules}`);
      await fs.write(GUEST.udevRules, UDEV_RULES, { uid: 0, gid: 0, mode: 0o644 });

      await transformPreload(fs, commentOutLines);

      if (publicKey) await addAuthorizedKey(fs, publicKey);
      if (hostKeys) await installHostKeys(fs, hostKeys);
    },
    { destination: options.destination, keepRoot: options.keepRoot, workDir: options.workDir }
  );
}

/** Undo prep's udev rule and preload changes. Injected keys stay. */
export async function unprep(exec: Executor, options: UnprepOptions): Promise<void> {
  await withRootPartition(
    exec,
    options.source,
    async (rootPath) => {
      const fs = new DebugFs(exec, rootPath);
      INFO(`Removing ${GUEST.udevRules}`);
      await fs.remove(GUEST.udevRules);
      await transformPreload(fs, uncommentLines);
    },
    { destination: options.destination, keepRoot: options.keepRoot, workDir: options.workDir }
  );
}

/** Pull host keys out of an image into a tar archive at options.output. */
export async function extract(exec: Executor, options: ExtractOptions): Promise<HostKey[]> {
  if (options.kind !== "hostkeys") throw new UsageError(`Unknown extract kind: ${String(options.kind)}`);

  const keys = await withRootPartition(
    exec,
    options.source,
    async (rootPath) => {
      const fs = new DebugFs(exec, rootPath);
      const found: HostKey[] = [];
      for await (const entry of fs.list(GUEST.sshDir, GUEST.hostKeyGlob)) {
        if (entry.type !== "file") continue;
        const path = `${GUEST.sshDir}/${entry.name}`;
        const data = await fs.cat(path);
        if (data.length !== entry.size) {
          throw new IntegrityError(`${path}: listed as ${entry.size} bytes but read ${data.length}`);
        }
        found.push({ name: entry.name, uid: entry.uid, gid: entry.gid, mode: entry.mode, data });
      }
      return found;
    },
    { readOnly: true, keepRoot: options.keepRoot, workDir: options.workDir }
  );

  if (!keys.length) throw new NotFoundError(`No host keys found in ${GUEST.sshDir}`);

  const archive = await packHostKeys(keys, options.now ?? new Date());
  await writeFile(options.output, "", { mode: 0o600 });
  await chmod(options.output, 0o600);
  await writeFile(options.output, archive);
  INFO(`Extracted ${keys.length} host keys to ${options.output}`);
  return keys;
}

/** Extend a file by growth bytes without writing them. */
export async function growFile(path: string, growth: number): Promise<number> {
  const fh = await open(path, "a");
  try {
    const { size } = await fh.stat();
    await fh.truncate(size + growth);
    INFO(`Growing root partition by ${growth} bytes to ${size + growth}`);
    return size + growth;
  } finally {
    await fh.close();
  }
}

/**
 * Check and repair, grow the filesystem to fill its file, then verify
 * read-only. The final check failing aborts the prep.
 */
export async function resizeFilesystem(exec: Executor, rootPath: string): Promise<void> {
  const preview = await exec.run([TOOLS.e2fsck, "-n", "-f", rootPath], { allowNonZeroExit: true });
  if (preview.code !== 0) WARN(`e2fsck preview reported problems (code ${preview.code}), repairing`);

  const fixCmd = [TOOLS.e2fsck, "-p", "-f", rootPath];
  const fix = await exec.run(fixCmd, { allowNonZeroExit: true });
  if (fix.code > 2) throw new CommandError(fixCmd, fix, `e2fsck failed with code ${fix.code}`);

  await exec.run([TOOLS.resize2fs, rootPath]);
  await exec.run([TOOLS.e2fsck, "-n", "-f", rootPath]);
}

async function transformPreload(fs: DebugFs, transform: (text: string) => string): Promise<void> {
  const current = await fs.readIfExists(GUEST.preload);
  if (current === undefined) {
    WARN(`${GUEST.preload} not found, leaving it alone`);
    return;
  }
  const updated = transform(decode(current));
  if (updated === decode(current)) {
    trace("%s already in the requested state", GUEST.preload);
    return;
  }
  INFO(`Updating ${GUEST.preload}`);
  await fs.write(GUEST.preload, encode(updated), { uid: 0, gid: 0, mode: 0o644 });
}

async function addAuthorizedKey(fs: DebugFs, key: Uint8Array): Promise<void> {
  const existing = (await fs.readIfExists(GUEST.authorizedKeys)) ?? Buffer.alloc(0);
  const updated = appendKey(existing, key);
  await fs.makeDirectory(GUEST.piSshDir, { uid: PI_UID, gid: PI_GID, mode: 0o700 });
  if (updated.equals(existing)) {
    INFO(`Public key already present in ${GUEST.authorizedKeys}`);
  } else {
    INFO(`Adding public key to ${GUEST.authorizedKeys}`);
  }
  await fs.write(GUEST.authorizedKeys, updated, { uid: PI_UID, gid: PI_GID, mode: 0o600 });
}

async function installHostKeys(fs: DebugFs, keys: HostKey[]): Promise<void> {
  for (const key of keys) {
    INFO(`Installing host key ${GUEST.sshDir}/${key.name}`);
    await fs.write(`${GUEST.sshDir}/${key.name}`, key.data, { uid: key.uid, gid: key.gid, mode: key.mode });
  }
  const script = await fs.cat(GUEST.regenInitScript);
  const stripped = stripLinesContaining(decode(script), KEYGEN_COMMAND);
  INFO(`Disabling host key regeneration in ${GUEST.regenInitScript}`);
  await fs.write(GUEST.regenInitScript, encode(stripped), { uid: 0, gid: 0, mode: 0o755 });
}
