import { mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, posix } from "node:path";
import { TOOLS } from "../src/lib/config";
import type { ExecOptions, ExecResult, Responder } from "../src/lib/executor";

export const ok = (stdout = "", stderr = ""): ExecResult => ({ code: 0, stdout, stderr });

const BANNER = "debugfs 1.47.0 (5-Feb-2023)\n";

export const BOOT_START = 4096;
export const ROOT_START = 8192;

export function tempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), "piemu-test-"));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

/** Write an image whose bytes before ROOT_START are 0xb0 and whose root partition is `root`. */
export function makeImage(path: string, root: Buffer = Buffer.alloc(4096, 0x52)): Buffer {
  const image = Buffer.concat([Buffer.alloc(ROOT_START, 0xb0), root]);
  writeFileSync(path, image, { mode: 0o644 });
  return image;
}

/** `parted -m unit B print` output for a two-partition image of the given size. */
export function partedListing(image: string, size: number, lastPartition = 2): string {
  const lines = [
    "BYT;",
    `${image}:${size}B:file:512:512:msdos::;`,
    `1:${BOOT_START}B:${ROOT_START - 1}B:${ROOT_START - BOOT_START}B:fat32::lba;`,
  ];
  if (lastPartition === 2) lines.push(`2:${ROOT_START}B:${size - 1}B:${size - ROOT_START}B:ext4::;`);
  return lines.join("\n") + "\n";
}

export type FakeNode = {
  type: "file" | "directory";
  content: Buffer;
  uid: number;
  gid: number;
  mode: number;
};

export type FakeGuestOptions = {
  /** Exit code of the repairing `e2fsck -p` run. */
  e2fsckFixCode?: number;
  /** Exit code of the read-only `e2fsck -n` run that follows resize2fs. */
  e2fsckVerifyCode?: number;
  /** Partition number on the last line of the parted listing. */
  lastPartition?: number;
};

/** Split a debugfs command line, honouring double quotes. */
export function tokenize(line: string): string[] {
  const out: string[] = [];
  const re = /"([^"]*)"|(\S+)/g;
  let m: RegExpExecArray | null;
  while ((m = re.exec(line))) out.push(m[1] ?? m[2] ?? "");
  return out;
}

/**
 * In-memory root filesystem behind a scripted executor: answers debugfs
 * requests and batches, parted listings and resizes, and the e2fsck/resize2fs
 * calls of a grow.
 */
export class FakeGuest {
  readonly nodes = new Map<string, FakeNode>();
  /** Size that `ls -p` reports instead of the real one. */
  readonly listedSize = new Map<string, number>();
  readonly batches: string[] = [];
  readonly resized: { path: string; size: number }[] = [];
  private inode = 12;
  private readonly inodes = new Map<string, number>();

  constructor(private readonly options: FakeGuestOptions = {}) {
    this.dir("/", 0, 0, 0o755);
  }

  dir(path: string, uid = 0, gid = 0, mode = 0o755): this {
    this.nodes.set(path, { type: "directory", content: Buffer.alloc(0), uid, gid, mode });
    return this;
  }

  file(path: string, content: string | Buffer, uid = 0, gid = 0, mode = 0o644): this {
    let parent = posix.dirname(path);
    const missing: string[] = [];
    while (!this.nodes.has(parent)) {
      missing.unshift(parent);
      parent = posix.dirname(parent);
    }
    for (const d of missing) this.dir(d);
    this.nodes.set(path, { type: "file", content: Buffer.from(content), uid, gid, mode });
    return this;
  }

  text(path: string): string | undefined {
    return this.nodes.get(path)?.content.toString("latin1");
  }

  get responder(): Responder {
    return (cmd, options) => this.respond(cmd, options);
  }

  respond(cmd: string[], options?: ExecOptions): ExecResult {
    const [tool, ...args] = cmd;
    if (tool === TOOLS.debugfs) {
      if (args[0] === "-R") return this.debugfs([args[1] ?? ""]);
      const stdin = options?.stdin ?? "";
      const script = typeof stdin === "string" ? stdin : Buffer.from(stdin).toString();
      this.batches.push(script);
      return this.debugfs(script.split("\n").filter(Boolean));
    }
    if (tool === TOOLS.parted) {
      if (args.includes("print")) {
        const image = args[2] ?? "";
        return ok(partedListing(image, statSync(image).size, this.options.lastPartition));
      }
      return ok();
    }
    if (tool === TOOLS.e2fsck) {
      if (args[0] === "-p") return { code: this.options.e2fsckFixCode ?? 0, stdout: "", stderr: "" };
      if (this.resized.length) return { code: this.options.e2fsckVerifyCode ?? 0, stdout: "", stderr: "" };
      return ok();
    }
    if (tool === TOOLS.resize2fs) {
      const path = args[0] ?? "";
      this.resized.push({ path, size: statSync(path).size });
      return ok();
    }
    return ok();
  }

  private debugfs(lines: string[]): ExecResult {
    let cwd = "/";
    let stdout: Buffer = Buffer.alloc(0);
    let stderr = BANNER;
    const resolve = (p: string) => posix.resolve(cwd, p);
    for (const line of lines) {
      const [op, ...a] = tokenize(line);
      const err = (msg: string) => { stderr += `${op}: ${msg}\n`; };
      switch (op) {
        case "cat": {
          const node = this.nodes.get(resolve(a[0] ?? ""));
          if (node?.type === "file") stdout = Buffer.concat([stdout, node.content]);
          else err("File not found by ext2_lookup");
          break;
        }
        case "ls": {
          const dir = resolve(a[a.length - 1] ?? "");
          const node = this.nodes.get(dir);
          if (node?.type !== "directory") { err("File not found by ext2_lookup"); break; }
          let out = `/2/${this.modeField(node)}/0/0/./\n/2/040755/0/0/../\n`;
          for (const [path, child] of this.nodes) {
            if (path === dir || posix.dirname(path) !== dir) continue;
            const size = child.type === "file" ? String(this.listedSize.get(path) ?? child.content.length) : "";
            out += `/${this.ino(path)}/${this.modeField(child)}/${child.uid}/${child.gid}/${posix.basename(path)}/${size}/\n`;
          }
          stdout = Buffer.concat([stdout, Buffer.from(out)]);
          break;
        }
        case "cd": {
          const target = resolve(a[0] ?? "");
          if (this.nodes.get(target)?.type === "directory") cwd = target;
          else err("File not found by ext2_lookup");
          break;
        }
        case "rm": {
          const target = resolve(a[0] ?? "");
          if (this.nodes.get(target)?.type === "file") this.nodes.delete(target);
          else err("File not found by ext2_lookup while trying to resolve filename");
          break;
        }
        case "write": {
          const target = resolve(a[1] ?? "");
          if (this.nodes.has(target)) { err(`Ext2 file already exists`); break; }
          // debugfs copies the host file's mode; ownership comes out as the caller's.
          this.nodes.set(target, { type: "file", content: readFileSync(a[0] ?? ""), uid: 4242, gid: 4242, mode: 0o600 });
          break;
        }
        case "mkdir": {
          const target = resolve(a[0] ?? "");
          if (this.nodes.has(target)) { err("Ext2 directory already exists"); break; }
          if (this.nodes.get(posix.dirname(target))?.type !== "directory") { err("File not found by ext2_lookup"); break; }
          this.dir(target, 4242, 4242, 0o755);
          break;
        }
        case "set_inode_field": {
          const node = this.nodes.get(resolve(a[0] ?? ""));
          if (!node) { err("File not found by ext2_lookup"); break; }
          const value = a[2] ?? "";
          if (a[1] === "uid") node.uid = Number(value);
          else if (a[1] === "gid") node.gid = Number(value);
          else if (a[1] === "mode") {
            const raw = parseInt(value, 8);
            if ((raw & 0o170000) !== (node.type === "directory" ? 0o040000 : 0o100000)) err("type bits changed");
            node.mode = raw & 0o7777;
          } else err(`invalid field specifier: ${a[1] ?? ""}`);
          break;
        }
        default:
          err("Command not found");
      }
    }
    return { code: 0, stdout: stdout.toString(), stderr, stdoutBytes: stdout };
  }

  private modeField(node: FakeNode): string {
    const type = node.type === "directory" ? 0o040000 : 0o100000;
    return (type | node.mode).toString(8).padStart(6, "0");
  }

  private ino(path: string): number {
    let n = this.inodes.get(path);
    if (n === undefined) {
      n = this.inode++;
      this.inodes.set(path, n);
    }
    return n;
  }
}

/** A guest as a freshly written Raspbian image looks to the transforms. */
export function raspbianGuest(options?: FakeGuestOptions): FakeGuest {
  return new FakeGuest(options)
    .dir("/etc").dir("/etc/udev").dir("/etc/udev/rules.d").dir("/etc/ssh").dir("/etc/init.d")
    .dir("/home").dir("/home/pi", 1000, 1000, 0o755)
    .file("/etc/ld.so.preload", "/usr/lib/arm-linux-gnueabihf/libarmmem-${PLATFORM}.so\n")
    .file(
      "/etc/init.d/regenerate_ssh_host_keys",
      "#!/bin/sh\n### BEGIN INIT INFO\n" +
        "do_start() {\n  rm -f /etc/ssh/ssh_host_*_key*\n  ssh-keygen -A\n  update-rc.d regenerate_ssh_host_keys remove\n}\n",
      0, 0, 0o755
    );
}
