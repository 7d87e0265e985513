import { TOOLS } from "./config";
import { MissingToolError } from "./errors";
import type { Executor } from "./executor";

export function shellQuote(p: string) {
  return `'${p.replaceAll("'", "'\\''")}'`;
}

export const REQUIRED_TOOLS: Record<string, string[]> = {
  prep: [TOOLS.parted, TOOLS.debugfs, TOOLS.e2fsck, TOOLS.resize2fs],
  unprep: [TOOLS.parted, TOOLS.debugfs],
  extract: [TOOLS.parted, TOOLS.debugfs],
  run: [TOOLS.qemu],
};

export async function missingTools(exec: Executor, tools: string[]): Promise<string[]> {
  const missing: string[] = [];
  for (const tool of tools) {
    const res = await exec.run(["sh", "-c", `command -v ${shellQuote(tool)}`], { allowNonZeroExit: true });
    if (res.code !== 0) missing.push(tool);
  }
  return missing;
}

export async function requireTools(exec: Executor, command: string): Promise<void> {
  const missing = await missingTools(exec, REQUIRED_TOOLS[command] ?? []);
  if (missing.length) throw new MissingToolError(missing);
}
