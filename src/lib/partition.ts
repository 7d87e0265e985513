import { chmod, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { KEPT_ROOT_NAME, TOOLS } from "./config";
import { dataCopy } from "./copy";
import { LayoutError } from "./errors";
import type { Executor } from "./executor";
import { INFO, logger } from "./log";

const trace = logger("partition");

export interface Partition {
  number: number;
  start: number;
  end: number;
  size: number;
}

/** Parse the partition lines of `parted -m ... unit B print`. */
export function parsePartedOutput(text: string): Partition[] {
  const partitions: Partition[] = [];
  for (const line of text.split(/\r?\n/)) {
    const m = line.trim().match(/^(\d+):(\d+)B:(\d+)B:(\d+)B:/);
    if (m) {
      partitions.push({ number: Number(m[1]), start: Number(m[2]), end: Number(m[3]), size: Number(m[4]) });
    }
  }
  return partitions;
}

/**
 * Byte offset of the root partition. The last line of the listing has to
 * describe partition 2; anything else is not a layout we know how to handle.
 */
export function findRootOffset(text: string): number {
  const lines = text.split(/\r?\n/).map((l) => l.trim()).filter(Boolean);
  const last = lines[lines.length - 1] ?? "";
  if (!last.startsWith("2:")) {
    throw new LayoutError(`Unexpected partition layout: last entry is '${last}', expected partition 2`);
  }
  const m = last.match(/^2:(\d+)B:/);
  if (!m) throw new LayoutError(`Unexpected partition layout: cannot read start of '${last}'`);
  return Number(m[1]);
}

export async function readRootOffset(exec: Executor, image: string): Promise<number> {
  const res = await exec.run([TOOLS.parted, "-s", "-m", image, "unit", "B", "print"]);
  trace("partitions of %s: %o", image, parsePartedOutput(res.stdout));
  return findRootOffset(res.stdout);
}

/**
 * The root partition copied out to its own file. Removed on release unless it
 * was created as the kept root.img.
 */
export class RootPartitionExtract {
  private constructor(readonly path: string, private readonly tempDir: string | undefined) {}

  static async acquire(keep: boolean, workDir = process.cwd()): Promise<RootPartitionExtract> {
    if (keep) {
      const path = join(workDir, KEPT_ROOT_NAME);
      await writeFile(path, "", { mode: 0o600 });
      await chmod(path, 0o600);
      return new RootPartitionExtract(path, undefined);
    }
    const dir = await mkdtemp(join(tmpdir(), "piemu-root-"));
    const path = join(dir, KEPT_ROOT_NAME);
    await writeFile(path, "", { mode: 0o600 });
    return new RootPartitionExtract(path, dir);
  }

  get kept(): boolean {
    return this.tempDir === undefined;
  }

  async release(): Promise<void> {
    if (this.tempDir === undefined) {
      INFO(`Root partition kept at ${this.path}`);
      return;
    }
    await rm(this.tempDir, { recursive: true, force: true });
  }
}

export type RootPartitionOptions = {
  /** Reassembled image path; defaults to the source image. */
  destination?: string;
  /** Only read the partition: never write an image or touch the partition table. */
  readOnly?: boolean;
  /** Keep the extracted partition as root.img in workDir. */
  keepRoot?: boolean;
  workDir?: string;
};

/**
 * Extract the root partition of image, hand its path to body and, when body
 * succeeds and the scope is not read-only, write the (possibly grown)
 * partition back into destination and stretch partition 2 to the end of it.
 * The extract is released on every path out of this function.
 */
export async function withRootPartition<T>(
  exec: Executor,
  image: string,
  body: (rootPath: string) => Promise<T>,
  options: RootPartitionOptions = {}
): Promise<T> {
  const offset = await readRootOffset(exec, image);
  trace("root partition of %s starts at %d", image, offset);

  const extract = await RootPartitionExtract.acquire(!!options.keepRoot, options.workDir);
  try {
    await dataCopy(image, extract.path, { sourceOffset: offset });
    const result = await body(extract.path);
    if (!options.readOnly) {
      await reassemble(exec, image, options.destination ?? image, offset, extract.path);
    }
    return result;
  } finally {
    await extract.release();
  }
}

async function reassemble(exec: Executor, source: string, destination: string, offset: number, rootPath: string) {
  if (resolve(source) !== resolve(destination)) {
    await writeFile(destination, "", { mode: 0o600 });
    await chmod(destination, 0o600);
    await dataCopy(source, destination, { count: offset });
  }
  await dataCopy(rootPath, destination, { destOffset: offset });
  // resizepart has to run in sector units to reach the last sector exactly.
  await exec.run([TOOLS.parted, "-s", destination, "--", "unit", "s", "resizepart", "2", "-1s"]);
}
