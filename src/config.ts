import { stat } from "fs/promises";
import { truncateToSeconds } from "./time";

const FALLBACK_LANGUAGE = "en";

/**
 * Reads [`SOURCE_DATE_EPOCH`](https://reproducible-builds.org/specs/source-date-epoch/).
 * Returns `undefined` when the variable is unset or not a whole number of seconds.
 */
export function sourceDateEpoch(
  env: NodeJS.ProcessEnv = process.env,
): Date | undefined {
  const value = env.SOURCE_DATE_EPOCH?.trim();
  if (!value || !/^\d+$/.test(value)) {
    return undefined;
  }

  return new Date(Number(value) * 1000);
}

/** The newest modification time among `paths`. */
export async function latestModification(paths: string[]): Promise<Date> {
  const stats = await Promise.all(paths.map((path) => stat(path)));
  const latest = stats.reduce((max, { mtimeMs }) => Math.max(max, mtimeMs), 0);

  return truncateToSeconds(new Date(latest));
}

/**
 * The modification date stamped on the package document and every archive
 * entry. Identical inputs must give identical dates.
 */
export async function resolveModified(
  sources: string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<Date> {
  return sourceDateEpoch(env) ?? (await latestModification(sources));
}

/** Language part of a POSIX locale such as `fr_CA.UTF-8`. */
export function defaultLanguage(env: NodeJS.ProcessEnv = process.env): string {
  const [language] = (env.LANG ?? "").split(/[_.@]/);

  if (!language || language === "C" || language === "POSIX") {
    return FALLBACK_LANGUAGE;
  }

  return language;
}
