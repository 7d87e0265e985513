#!/usr/bin/env tsx
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { numberArg, parseArgs, splitGlobal, stringArg, type ArgSpec } from "./lib/args";
import { requireTools } from "./lib/deps";
import { UsageError } from "./lib/errors";
import { NodeExecutor, type Executor } from "./lib/executor";
import { ERROR, INFO, isDebug, setDebug } from "./lib/log";
import { runEmulator } from "./lib/qemu";
import { extract, prep, unprep } from "./lib/transforms";
import pkg from "../package.json";

const VERSION: string = pkg.version || "0.0.0";

function usage() {
  console.log(`piemu v${VERSION}\n\n` +
`Usage:\n  piemu [--debug] [--keep-root] <command> [options]\n\n` +
`Commands:\n  version                              Print version\n  prep <image> [dest]                  Make an image bootable under QEMU\n  unprep <image> [dest]                Undo prep so the image boots on a Pi again\n  extract <image> hostkeys <out.tar>   Save the image's ssh host keys\n  run <image>                          Boot the image in qemu-system-arm\n\n` +
`Global Options:\n  -h, --help                 Show help\n  -v, --version              Show version\n  --debug                    Trace every external command\n  --keep-root                Keep the extracted root partition as ./root.img\n\n` +
`Prep Options:\n  --grow-root <SIZE>         Grow the root filesystem (e.g. 512M, 2G)\n  --add-public-key <FILE>    Append a public key to pi's authorized_keys\n  --set-host-keys <FILE>     Install host keys from a tar archive\n\n` +
`Run Options:\n  --kernel <FILE>            Kernel image (default: kernel-qemu, or PIEMU_KERNEL)\n  --with-ssh-port <PORT>     Forward host PORT to the guest's ssh\n  --with-display             Open a display window instead of -nographic\n  --with-audio               Attach an AC97 sound card\n`);
}

const GLOBAL_FLAGS: ArgSpec[] = [
  { name: "debug", type: "boolean" },
  { name: "keep-root", type: "boolean" },
  { name: "help", alias: "h", type: "boolean" },
  { name: "version", alias: "v", type: "boolean" },
];

// Global flags are accepted after the command word too.
const withGlobals = (specs: ArgSpec[]) => [...specs, GLOBAL_FLAGS[0], GLOBAL_FLAGS[1]];

function need(value: string | undefined, what: string): string {
  if (!value) throw new UsageError(`Missing ${what}`);
  return value;
}

export async function main(argv: string[], exec: Executor = new NodeExecutor()): Promise<void> {
  const { global, command, rest } = splitGlobal(argv, GLOBAL_FLAGS);
  if (global.args.help) return usage();
  if (global.args.version) { console.log(VERSION); return; }
  if (global.args.debug) setDebug(true);
  if (!command) return usage();

  if (command === "version") { console.log(VERSION); return; }

  if (command === "prep") {
    const { args, positional } = parseArgs(rest, withGlobals([
      { name: "grow-root", type: "string" },
      { name: "add-public-key", type: "string" },
      { name: "set-host-keys", type: "string" },
    ]));
    if (args.debug) setDebug(true);
    const source = need(positional[0], "<image>");
    await requireTools(exec, "prep");
    await prep(exec, {
      source,
      destination: positional[1],
      growRoot: stringArg(args, "grow-root"),
      addPublicKey: stringArg(args, "add-public-key"),
      setHostKeys: stringArg(args, "set-host-keys"),
      keepRoot: !!(global.args["keep-root"] || args["keep-root"]),
    });
    console.log("✓ Prep completed");
    return;
  }

  if (command === "unprep") {
    const { args, positional } = parseArgs(rest, withGlobals([]));
    if (args.debug) setDebug(true);
    const source = need(positional[0], "<image>");
    await requireTools(exec, "unprep");
    await unprep(exec, {
      source,
      destination: positional[1],
      keepRoot: !!(global.args["keep-root"] || args["keep-root"]),
    });
    console.log("✓ Unprep completed");
    return;
  }

  if (command === "extract") {
    const { args, positional } = parseArgs(rest, withGlobals([]));
    if (args.debug) setDebug(true);
    const [image, kind, output] = positional;
    const source = need(image, "<image>");
    if (kind !== "hostkeys") throw new UsageError(`Unknown extract kind '${kind ?? ""}' (expected hostkeys)`);
    const out = need(output, "<output>");
    await requireTools(exec, "extract");
    await extract(exec, { source, kind, output: out, keepRoot: !!(global.args["keep-root"] || args["keep-root"]) });
    return;
  }

  if (command === "run") {
    const { args, positional } = parseArgs(rest, withGlobals([
      { name: "kernel", type: "string" },
      { name: "with-ssh-port", type: "number" },
      { name: "with-display", type: "boolean" },
      { name: "with-audio", type: "boolean" },
    ]));
    if (args.debug) setDebug(true);
    const image = need(positional[0], "<image>");
    await requireTools(exec, "run");
    INFO(`Booting ${image}`);
    await runEmulator(exec, {
      image,
      kernel: stringArg(args, "kernel"),
      sshPort: numberArg(args, "with-ssh-port"),
      withDisplay: !!args["with-display"],
      withAudio: !!args["with-audio"],
    });
    return;
  }

  throw new UsageError(`Unknown command: ${command}`);
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return pathToFileURL(realpathSync(entry)).href === import.meta.url;
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  await main(process.argv.slice(2)).catch((e: unknown) => {
    ERROR(e instanceof Error ? e.message : String(e));
    if (isDebug() && e instanceof Error && e.stack) console.error(e.stack);
    process.exitCode = 1;
  });
}
