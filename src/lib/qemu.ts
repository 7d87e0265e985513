import { DEFAULT_KERNEL, TOOLS } from "./config";
import { CommandError, UsageError } from "./errors";
import type { ExecResult, Executor } from "./executor";

export type QemuOptions = {
  image: string;
  kernel?: string;
  sshPort?: number;
  withDisplay?: boolean;
  withAudio?: boolean;
  memoryMB?: number;
};

export const KERNEL_APPEND = "root=/dev/sda2 panic=1 rootfstype=ext4 rw";

export function buildQemuCommand(opts: QemuOptions): string[] {
  const cmd = [
    TOOLS.qemu,
    "-M", "versatilepb",
    "-cpu", "arm1176",
    "-m", String(opts.memoryMB ?? 256),
    "-kernel", opts.kernel ?? DEFAULT_KERNEL,
    "-append", KERNEL_APPEND,
    "-drive", `format=raw,file=${opts.image}`,
    "-no-reboot",
    "-serial", "mon:stdio",
  ];
  if (!opts.withDisplay) cmd.push("-nographic");
  if (opts.sshPort !== undefined) {
    if (!Number.isInteger(opts.sshPort) || opts.sshPort < 1 || opts.sshPort > 65535) {
      throw new UsageError(`Invalid ssh port: ${opts.sshPort}`);
    }
    cmd.push("-net", "nic", "-net", `user,hostfwd=tcp::${opts.sshPort}-:22`);
  }
  if (opts.withAudio) cmd.push("-audiodev", "pa,id=snd0", "-device", "AC97,audiodev=snd0");
  return cmd;
}

/** Boot the image, wiring the emulator's console to this terminal. */
export async function runEmulator(exec: Executor, opts: QemuOptions): Promise<ExecResult> {
  const cmd = buildQemuCommand(opts);
  const result = await exec.run(cmd, {
    onStdoutChunk: (s) => process.stdout.write(s),
    onStderrChunk: (s) => process.stderr.write(s),
    allowNonZeroExit: true,
  });
  // The console was already streamed; the error carries only the exit code.
  if (result.code !== 0) {
    throw new CommandError(cmd, { code: result.code, stdout: "", stderr: "" }, `${cmd[0]} exited with code ${result.code}`);
  }
  return result;
}
