import { open, stat, type FileHandle } from "node:fs/promises";
import { resolve } from "node:path";
import { resolveSuffix, type SizeInput } from "./size";

export const CHUNK_SIZE = 4 * 1024 * 1024;

export type CopyOptions = {
  sourceOffset?: number;
  destOffset?: number;
  /** Bytes to copy; a size string such as "1M", or omitted for "until the source ends". */
  count?: SizeInput;
  chunkSize?: number;
  /** Mode used if dest has to be created. */
  mode?: number;
};

/**
 * Copy a byte range from source into dest at destOffset, then truncate dest
 * to exactly destOffset + copied bytes. Bytes of dest before destOffset are
 * kept. Returns the number of bytes copied.
 *
 * source and dest may be the same file: with no count, the whole remainder of
 * the file past sourceOffset is copied, measured before anything is written.
 */
export async function dataCopy(source: string, dest: string, options: CopyOptions = {}): Promise<number> {
  const sourceOffset = options.sourceOffset ?? 0;
  const destOffset = options.destOffset ?? 0;
  const chunkSize = options.chunkSize ?? CHUNK_SIZE;
  let count = resolveSuffix(options.count);

  if (resolve(source) === resolve(dest)) {
    const available = Math.max(0, (await stat(source)).size - sourceOffset);
    count = count === undefined ? available : Math.min(count, available);
    const fh = await open(source, "r+");
    try {
      const copied =
        destOffset > sourceOffset
          ? await copyBackward(fh, sourceOffset, destOffset, count, chunkSize)
          : await copyForward(fh, fh, sourceOffset, destOffset, count, chunkSize);
      await fh.truncate(destOffset + copied);
      return copied;
    } finally {
      await fh.close();
    }
  }

  const src = await open(source, "r");
  try {
    const dst = await openForWrite(dest, options.mode ?? 0o666);
    try {
      const copied = await copyForward(src, dst, sourceOffset, destOffset, count, chunkSize);
      await dst.truncate(destOffset + copied);
      return copied;
    } finally {
      await dst.close();
    }
  } finally {
    await src.close();
  }
}

async function openForWrite(path: string, mode: number): Promise<FileHandle> {
  try {
    return await open(path, "r+");
  } catch (e) {
    if (isErrno(e, "ENOENT")) return open(path, "w+", mode);
    throw e;
  }
}

function isErrno(e: unknown, code: string): boolean {
  return e instanceof Error && "code" in e && e.code === code;
}

async function copyForward(
  src: FileHandle,
  dst: FileHandle,
  sourceOffset: number,
  destOffset: number,
  count: number | undefined,
  chunkSize: number
): Promise<number> {
  const buf = Buffer.alloc(chunkSize);
  let copied = 0;
  while (count === undefined || copied < count) {
    const want = count === undefined ? chunkSize : Math.min(chunkSize, count - copied);
    const { bytesRead } = await src.read(buf, 0, want, sourceOffset + copied);
    if (bytesRead === 0) break;
    await writeFully(dst, buf.subarray(0, bytesRead), destOffset + copied);
    copied += bytesRead;
  }
  return copied;
}

// Same-file copy to a higher offset: walk from the end so nothing is read after being overwritten.
async function copyBackward(
  fh: FileHandle,
  sourceOffset: number,
  destOffset: number,
  count: number,
  chunkSize: number
): Promise<number> {
  const buf = Buffer.alloc(chunkSize);
  let remaining = count;
  while (remaining > 0) {
    const len = Math.min(chunkSize, remaining);
    const start = remaining - len;
    const { bytesRead } = await fh.read(buf, 0, len, sourceOffset + start);
    await writeFully(fh, buf.subarray(0, bytesRead), destOffset + start);
    remaining = start;
  }
  return count;
}

async function writeFully(fh: FileHandle, data: Buffer, position: number): Promise<void> {
  let written = 0;
  while (written < data.length) {
    const { bytesWritten } = await fh.write(data, written, data.length - written, position + written);
    written += bytesWritten;
  }
}
