import createDebug from "debug";

export const INFO = (s: string) => console.log(`[INFO] ${s}`);
export const WARN = (s: string) => console.warn(`[WARN] ${s}`);
export const ERROR = (s: string) => console.error(`[ERROR] ${s}`);

const NAMESPACE = "piemu";

export type Trace = createDebug.Debugger;

export function logger(name: string): Trace {
  return createDebug(`${NAMESPACE}:${name}`);
}

// --debug on the command line; DEBUG=piemu:* works as well.
export function setDebug(on: boolean): void {
  if (on) createDebug.enable(`${NAMESPACE}:*`);
  else createDebug.disable();
}

export function isDebug(): boolean {
  return createDebug.enabled(`${NAMESPACE}:exec`);
}
