import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { posix, join } from "node:path";
import { TOOLS } from "./config";
import { CommandError, PiemuError, UnrecognizedTypeError } from "./errors";
import type { ExecResult, Executor } from "./executor";
import { globToRegExp } from "./glob";
import { logger } from "./log";

const trace = logger("debugfs");

export const S_IFMT = 0o170000;
export const S_IFDIR = 0o040000;
export const S_IFREG = 0o100000;

// debugfs prints this on stderr for every invocation.
const BANNER = /^debugfs \d+\.\d+/;
export const NOT_FOUND = /File not found by ext2_lookup/;
export const ALREADY_EXISTS = /already exists/i;

export type FsEntryType = "file" | "directory";

export interface FsEntry {
  name: string;
  type: FsEntryType;
  /** Permission bits only. */
  mode: number;
  uid: number;
  gid: number;
  /** Reported for regular files only. */
  size?: number;
}

export interface FsStats {
  uid?: number;
  gid?: number;
  mode?: number;
}

export interface DebugfsCommand {
  op: string;
  args: string[];
  /** stderr messages from this command that do not count as failure. */
  tolerate?: RegExp;
}

/**
 * Ordered list of debugfs commands fed to one `debugfs -f -` invocation.
 */
export class DebugfsBatch {
  readonly commands: DebugfsCommand[] = [];

  add(op: string, ...args: string[]): this {
    this.commands.push({ op, args });
    return this;
  }

  addTolerating(tolerate: RegExp, op: string, ...args: string[]): this {
    this.commands.push({ op, args, tolerate });
    return this;
  }

  get length(): number {
    return this.commands.length;
  }

  render(): string {
    return this.commands.map((c) => renderCommand(c.op, c.args)).join("\n") + "\n";
  }

  /**
   * stderr lines that are neither the banner nor tolerated. debugfs prefixes
   * each message with the failing command's name, so a pattern only covers
   * lines of the command that declared it.
   */
  failures(stderr: string): string[] {
    return stderr
      .split(/\r?\n/)
      .map((l) => l.trim())
      .filter((l) => l && !BANNER.test(l))
      .filter((l) => !this.commands.some((c) => c.tolerate !== undefined && l.startsWith(`${c.op}: `) && c.tolerate.test(l)));
  }
}

export function renderCommand(op: string, args: string[]): string {
  return [op, ...args.map(quoteArg)].join(" ");
}

export function quoteArg(arg: string): string {
  if (/["\n\r]/.test(arg)) throw new PiemuError(`Unsupported character in debugfs argument: ${JSON.stringify(arg)}`);
  return arg === "" || /\s/.test(arg) ? `"${arg}"` : arg;
}

/**
 * Parse `ls -p` output: one `/inode/mode/uid/gid/name/size/` record per line,
 * size empty for directories.
 */
export function parseLsOutput(text: string): FsEntry[] {
  const entries: FsEntry[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line.startsWith("/")) continue;
    const fields = line.split("/");
    if (fields.length < 7) continue;
    const [, , modeField, uidField, gidField, name, sizeField] = fields;
    if (name === "." || name === "..") continue;
    const rawMode = parseInt(modeField, 8);
    const size = sizeField === "" ? undefined : Number(sizeField);
    entries.push({
      name,
      type: entryType(rawMode, name),
      mode: rawMode & 0o7777,
      uid: Number(uidField),
      gid: Number(gidField),
      ...(size === undefined ? {} : { size }),
    });
  }
  return entries;
}

function entryType(rawMode: number, name: string): FsEntryType {
  const fmt = rawMode & S_IFMT;
  if (fmt === S_IFDIR) return "directory";
  if (fmt === S_IFREG) return "file";
  throw new UnrecognizedTypeError(`Unrecognized inode type ${rawMode.toString(8)} for '${name}'`);
}

/**
 * An ext2/3/4 filesystem image manipulated through debugfs; never mounted.
 */
export class DebugFs {
  constructor(
    private readonly exec: Executor,
    readonly image: string,
    private readonly tool: string = TOOLS.debugfs
  ) {}

  /** Run a single read-only request (`debugfs -R`). */
  private async request(op: string, ...args: string[]): Promise<ExecResult> {
    const cmd = [this.tool, "-R", renderCommand(op, args), this.image];
    const result = await this.exec.run(cmd);
    const failures = new DebugfsBatch().failures(result.stderr);
    if (failures.length) throw new CommandError(cmd, result, `debugfs ${op} failed: ${failures[0]}`);
    return result;
  }

  /** Run a batch in one writable `debugfs -f -` invocation. */
  async runBatch(batch: DebugfsBatch): Promise<ExecResult> {
    const cmd = [this.tool, "-w", "-f", "-", this.image];
    const script = batch.render();
    trace("batch on %s:\n%s", this.image, script.trimEnd());
    const result = await this.exec.run(cmd, { stdin: script });
    const failures = batch.failures(result.stderr);
    if (failures.length) throw new CommandError(cmd, result, `debugfs batch failed: ${failures.join("; ")}`);
    return result;
  }

  async cat(path: string): Promise<Buffer> {
    const result = await this.request("cat", path);
    return result.stdoutBytes ?? Buffer.from(result.stdout);
  }

  /** Like cat, but resolves to undefined when the file does not exist. */
  async readIfExists(path: string): Promise<Buffer | undefined> {
    try {
      return await this.cat(path);
    } catch (e) {
      if (e instanceof CommandError && NOT_FOUND.test(e.result.stderr)) return undefined;
      throw e;
    }
  }

  async remove(path: string): Promise<void> {
    await this.runBatch(new DebugfsBatch().addTolerating(NOT_FOUND, "rm", path));
  }

  /**
   * Entries of a directory whose names match pattern. Every iteration runs
   * `ls -p` afresh.
   */
  list(path: string, pattern = "*"): AsyncIterable<FsEntry> {
    const matcher = globToRegExp(pattern);
    const listing = () => this.request("ls", "-p", path);
    return {
      async *[Symbol.asyncIterator]() {
        const result = await listing();
        for (const entry of parseLsOutput(result.stdout)) {
          if (matcher.test(entry.name)) yield entry;
        }
      },
    };
  }

  async setStats(path: string, stats: FsStats & { isDirectory: boolean }): Promise<void> {
    const batch = new DebugfsBatch();
    if (stats.uid !== undefined) batch.add("set_inode_field", path, "uid", String(stats.uid));
    if (stats.gid !== undefined) batch.add("set_inode_field", path, "gid", String(stats.gid));
    if (stats.mode !== undefined) {
      const typed = (stats.mode & 0o7777) | (stats.isDirectory ? S_IFDIR : S_IFREG);
      batch.add("set_inode_field", path, "mode", "0" + typed.toString(8));
    }
    if (batch.length) await this.runBatch(batch);
  }

  async makeDirectory(path: string, stats: FsStats = {}): Promise<void> {
    await this.runBatch(new DebugfsBatch().addTolerating(ALREADY_EXISTS, "mkdir", path));
    await this.setStats(path, { ...stats, isDirectory: true });
  }

  /**
   * Replace (or create) a file. debugfs cannot write over an existing file, so
   * the old one is removed in the same invocation before the new one is injected.
   */
  async write(path: string, content: Uint8Array | string, stats: FsStats = {}): Promise<void> {
    // A failed cd inside the batch would leave debugfs writing into /.
    await this.request("cd", posix.dirname(path));
    const staging = await mkdtemp(join(tmpdir(), "piemu-"));
    try {
      const staged = join(staging, "content");
      await writeFile(staged, content, { mode: 0o600 });
      const batch = new DebugfsBatch()
        .add("cd", posix.dirname(path))
        .addTolerating(NOT_FOUND, "rm", posix.basename(path))
        .add("write", staged, posix.basename(path));
      await this.runBatch(batch);
    } finally {
      await rm(staging, { recursive: true, force: true });
    }
    await this.setStats(path, { ...stats, isDirectory: false });
  }
}
