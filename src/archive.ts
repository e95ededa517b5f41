import archiver from "archiver";
import { createWriteStream } from "fs";
import { readFile, rm, rename } from "fs/promises";
import path from "path";
import { ArchiveError } from "./errors";
import { logger } from "./log";

const log = logger("archive");

export type ArchiveData =
  | { kind: "text"; text: string }
  | { kind: "file"; path: string };

/** One write into the archive. Entries are written in the order given. */
export interface ArchiveEntry {
  /** Path inside the archive. */
  name: string;

  data: ArchiveData;

  /** Store without compression. */
  store?: boolean;
}

export interface ArchiveOptions {
  /** Timestamp recorded for every entry. */
  date: Date;
}

function temporaryPathFor(destination: string): string {
  return path.join(
    path.dirname(destination),
    `.${path.basename(destination)}.${process.pid}.tmp`,
  );
}

/**
 * Writes `entries` as a zip file at `destination`. The archive is assembled in
 * a temporary file next to `destination` and only renamed into place once it
 * is complete, so a failed write never leaves a partial file behind.
 */
export async function commitArchive(
  entries: ArchiveEntry[],
  destination: string,
  options: ArchiveOptions,
): Promise<void> {
  const temporary = temporaryPathFor(destination);
  const output = createWriteStream(temporary);
  const archive = archiver("zip", {
    zlib: { level: 9 },
  });

  const closed = new Promise<void>((resolve, reject) => {
    output.on("close", resolve);
    output.on("error", reject);
    archive.on("error", reject);
    // Warnings are fatal here.
    archive.on("warning", reject);
  });
  // Observed from the start, so a failure while entries are still being read is not left unhandled.
  const settled = closed.then(
    () => undefined,
    (error: unknown) => error,
  );

  try {
    archive.pipe(output);

    for (const entry of entries) {
      const data = {
        name: entry.name,
        store: entry.store ?? false,
        date: options.date,
      };

      // archiver queues `append` calls in call order; `file` would queue after a stat instead.
      const contents =
        entry.data.kind === "text" ? entry.data.text : await readFile(entry.data.path);
      archive.append(contents, data);
    }

    await Promise.all([archive.finalize(), closed]);
    await rename(temporary, destination);
  } catch (error) {
    archive.abort();
    if (!output.closed) {
      const released = new Promise<void>((resolve) => output.once("close", () => resolve()));
      output.destroy();
      await released;
    }
    const closeError = await settled;
    if (closeError !== undefined && closeError !== error) {
      log("output also failed: %O", closeError);
    }
    await rm(temporary, { force: true });

    throw new ArchiveError(destination, { cause: error });
  }

  log("wrote %d entries to %s (%d bytes)", entries.length, destination, archive.pointer());
}
