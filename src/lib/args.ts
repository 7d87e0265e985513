import { UsageError } from "./errors";

export type ArgValue = string | boolean | number;
export type ArgSpec = { name: string; type: "string" | "boolean" | "number"; alias?: string; default?: ArgValue };

export type ParsedArgs = { args: Record<string, ArgValue | undefined>; positional: string[] };

/** Parse `--name value`, `--name=value`, `-a value` and bare boolean flags. */
export function parseArgs(argv: string[], specs: ArgSpec[]): ParsedArgs {
  const map = new Map<string, ArgSpec>();
  for (const s of specs) {
    map.set(`--${s.name}`, s);
    if (s.alias) map.set(`-${s.alias}`, s);
  }
  const result: Record<string, ArgValue | undefined> = {};
  for (const s of specs) {
    if (s.default !== undefined) result[s.name] = s.default;
  }
  const positional: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const tok = argv[i];
    if (!tok.startsWith("-") || tok === "-") { positional.push(tok); continue; }
    const eq = tok.indexOf("=");
    const flag = eq > 0 ? tok.slice(0, eq) : tok;
    const spec = map.get(flag);
    if (!spec) throw new UsageError(`Unknown argument: ${flag}`);
    if (spec.type === "boolean") {
      if (eq > 0) throw new UsageError(`${flag} does not take a value`);
      result[spec.name] = true;
      continue;
    }
    const val = eq > 0 ? tok.slice(eq + 1) : argv[++i];
    if (val === undefined) throw new UsageError(`Missing value for ${flag}`);
    if (spec.type === "number") {
      const n = Number(val);
      if (val.trim() === "" || !Number.isFinite(n)) throw new UsageError(`${flag} expects a number, got '${val}'`);
      result[spec.name] = n;
    } else {
      result[spec.name] = val;
    }
  }
  return { args: result, positional };
}

export function stringArg(args: ParsedArgs["args"], name: string): string | undefined {
  const v = args[name];
  return v === undefined ? undefined : String(v);
}

export function numberArg(args: ParsedArgs["args"], name: string): number | undefined {
  const v = args[name];
  return typeof v === "number" ? v : undefined;
}

/**
 * Split leading global flags (before the command word) from the rest.
 */
export function splitGlobal(argv: string[], globals: ArgSpec[]): { global: ParsedArgs; command?: string; rest: string[] } {
  const idx = argv.findIndex((t) => !t.startsWith("-"));
  const head = idx === -1 ? argv : argv.slice(0, idx);
  const global = parseArgs(head, globals);
  return { global, command: idx === -1 ? undefined : argv[idx], rest: idx === -1 ? [] : argv.slice(idx + 1) };
}
