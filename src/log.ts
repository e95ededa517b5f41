import debug, { Debugger } from "debug";

const NAMESPACE = "pagepress";

export function logger(scope: string): Debugger {
  return debug(`${NAMESPACE}:${scope}`);
}

/** Problems that do not stop the build. */
export const warn: Debugger = logger("warn");

/** Turns on warnings, or every namespace when `verbose` is set. `DEBUG` still wins when present. */
export function enableLogging(verbose: boolean, env: NodeJS.ProcessEnv = process.env) {
  if (verbose) {
    debug.enable(`${NAMESPACE}:*`);
  } else if (!env.DEBUG) {
    debug.enable(`${NAMESPACE}:warn`);
  }
}
