import { spawn } from "node:child_process";
import { CommandError } from "./errors";
import { logger } from "./log";

const trace = logger("exec");

export type ExecOptions = {
  cwd?: string;
  env?: Record<string, string | undefined>;
  timeoutMs?: number;
  stdin?: string | Uint8Array;
  onStdoutChunk?: (chunk: string) => void;
  onStderrChunk?: (chunk: string) => void;
  allowNonZeroExit?: boolean;
};

export type ExecResult = {
  code: number;
  stdout: string;
  stderr: string;
  // Raw stdout, for tools whose output is file content (debugfs cat).
  stdoutBytes?: Buffer;
};

export interface Executor {
  run(cmd: string[], options?: ExecOptions): Promise<ExecResult>;
}

export class NodeExecutor implements Executor {
  async run(cmd: string[], options: ExecOptions = {}): Promise<ExecResult> {
    const { cwd, env, timeoutMs, stdin, onStdoutChunk, onStderrChunk, allowNonZeroExit } = options;
    const [file, ...args] = cmd;
    if (!file) throw new Error("Empty command");
    trace("$ %s", cmd.join(" "));

    const proc = spawn(file, args, {
      cwd,
      env: env ? { ...process.env, ...env } : process.env,
      stdio: [stdin !== undefined ? "pipe" : "inherit", "pipe", "pipe"],
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    proc.stdout?.on("data", (chunk: Buffer) => {
      stdoutChunks.push(chunk);
      if (onStdoutChunk) onStdoutChunk(chunk.toString());
    });
    proc.stderr?.on("data", (chunk: Buffer) => {
      stderrChunks.push(chunk);
      if (onStderrChunk) onStderrChunk(chunk.toString());
    });

    // A child may exit without reading all of stdin; its exit code decides the result.
    const stdinErrors: Error[] = [];
    proc.stdin?.on("error", (e: NodeJS.ErrnoException) => {
      if (e.code !== "EPIPE") stdinErrors.push(e);
    });
    if (stdin !== undefined && proc.stdin) {
      proc.stdin.end(stdin);
    }

    let timedOut = false;
    let timeoutHandle: NodeJS.Timeout | undefined;
    if (timeoutMs && timeoutMs > 0) {
      timeoutHandle = setTimeout(() => {
        timedOut = true;
        proc.kill();
      }, timeoutMs);
    }

    let code: number;
    try {
      code = await new Promise<number>((resolve, reject) => {
        proc.on("error", reject);
        proc.on("close", (exitCode) => resolve(exitCode ?? (timedOut ? 124 : 1)));
      });
    } catch (e) {
      // spawn failures (ENOENT, EACCES) surface like a shell's "command not found"
      throw new CommandError(cmd, { code: 127, stdout: "", stderr: e instanceof Error ? e.message : String(e) });
    } finally {
      if (timeoutHandle) clearTimeout(timeoutHandle);
    }

    const stdoutBytes = Buffer.concat(stdoutChunks);
    const result: ExecResult = {
      code,
      stdout: stdoutBytes.toString(),
      stderr: Buffer.concat(stderrChunks).toString(),
      stdoutBytes,
    };
    trace("exit %d: %s", result.code, file);
    if (result.stderr) trace("stderr: %s", result.stderr.trim());

    const [stdinError] = stdinErrors;
    if (stdinError && result.code === 0) {
      throw new CommandError(cmd, result, `Failed to write stdin of ${file}: ${stdinError.message}`);
    }

    if (timedOut) {
      throw new CommandError(cmd, result, `Command timed out: ${cmd.join(" ")}`);
    }

    if (result.code !== 0 && !allowNonZeroExit) {
      throw new CommandError(cmd, result);
    }

    return result;
  }
}

export type RecordedCall = { cmd: string[]; options?: ExecOptions; result?: ExecResult };

export type Responder = (cmd: string[], options?: ExecOptions) => ExecResult | Promise<ExecResult>;

export class RecordingExecutor implements Executor {
  public calls: RecordedCall[] = [];
  constructor(private responses: Responder | ExecResult = { code: 0, stdout: "", stderr: "" }) {}
  async run(cmd: string[], options?: ExecOptions): Promise<ExecResult> {
    const res = typeof this.responses === "function" ? await this.responses(cmd, options) : this.responses;
    const copy: ExecResult = { ...res };
    this.calls.push({ cmd: [...cmd], options, result: copy });
    if (copy.code !== 0 && !options?.allowNonZeroExit) {
      throw new CommandError(cmd, copy);
    }
    return copy;
  }
}
