import type { ExecResult } from "./executor";

export class PiemuError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** An external tool exited non-zero or reported errors on stderr. */
export class CommandError extends PiemuError {
  constructor(public readonly cmd: string[], public readonly result: ExecResult, message?: string) {
    super(
      (message ?? `Command failed (${result.code}): ${cmd.join(" ")}`) +
        (result.stdout.trim() ? `\nstdout: ${result.stdout.trim()}` : "") +
        (result.stderr.trim() ? `\nstderr: ${result.stderr.trim()}` : "")
    );
  }
}

/** The partition table is not the two-partition, root-is-last layout. */
export class LayoutError extends PiemuError {}

/** Filesystem metadata and content disagree. */
export class IntegrityError extends PiemuError {}

/** An inode is neither a regular file nor a directory. */
export class UnrecognizedTypeError extends PiemuError {}

/** A host-key archive (or one of its members) fails the ownership/mode gate. */
export class PermissionPolicyError extends PiemuError {}

/** A public key file is empty or holds private key material. */
export class KeyPolicyError extends PiemuError {}

export class NotFoundError extends PiemuError {}

export class InvalidUnitError extends PiemuError {
  constructor(public readonly input: string) {
    super(`Invalid unit in size '${input}' (expected K, M or G)`);
  }
}

export class SizeParseError extends PiemuError {
  constructor(public readonly input: string) {
    super(`Invalid size '${input}'`);
  }
}

export class MissingToolError extends PiemuError {
  constructor(public readonly tools: string[]) {
    super(`Required tools not found on PATH: ${tools.join(", ")}`);
  }
}

export class UsageError extends PiemuError {}
