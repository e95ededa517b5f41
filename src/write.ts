import path from "path";
import { resolveModified } from "./config";
import { ImageProbe, probeImage } from "./image";
import { logger } from "./log";
import { parseDescription } from "./metadata";
import { Package, buildPackage } from "./package";
import { resolvePages } from "./resolve";
import { EpubWriter } from "./writer";

const log = logger("build");

export interface BuildOptions {
  /** Directory the description's page paths are relative to. */
  root: string;

  /** Defaults to reading image headers with sharp. */
  probe?: ImageProbe;

  /** Overrides the modification date derived from the environment and the input files. */
  modified?: Date;

  /** Extra files whose modification time counts towards the default date, such as the project file. */
  sources?: string[];

  env?: NodeJS.ProcessEnv;
}

/** Runs the description through normalization, page resolution and model building. Nothing is written. */
export async function loadPackage(
  description: unknown,
  options: BuildOptions,
): Promise<Package> {
  const book = parseDescription(description);

  const chapters = await resolvePages(book.chapter, {
    root: options.root,
    probe: options.probe ?? probeImage,
    orientation: book.rendition.orientation,
  });

  const modified =
    options.modified ??
    (await resolveModified(
      [
        ...chapters.flatMap(({ resources }) =>
          resources.map(({ source }) => source),
        ),
        ...(options.sources ?? []),
      ],
      options.env,
    ));

  return buildPackage(book.metadata, book.rendition, chapters, { modified });
}

/** A filename for the book derived from its primary title. */
export function defaultOutputName(title: string): string {
  const safe = title
    .replace(/[\u0000-\u001f<>:"/\\|?*]/g, "_")
    .replace(/^\.+/, "_")
    .trim();

  return `${safe || "book"}.epub`;
}

/**
 * Where the archive goes: `output` itself when it names an `.epub` file,
 * otherwise `<title>.epub` inside `output` (or `directory` when no output is given).
 */
export function resolveOutputPath(
  title: string,
  output: string | undefined,
  directory: string,
): string {
  if (output !== undefined && path.extname(output).toLowerCase() === ".epub") {
    return path.resolve(output);
  }

  return path.resolve(output ?? directory, defaultOutputName(title));
}

/** Write the provided package to a file. */
export async function writePackage(filename: string, pkg: Package) {
  const writer = new EpubWriter(pkg);
  await writer.write(filename);
}

/** Builds the described book and writes it to `filename`. Returns the built package. */
export async function writeEpub(
  filename: string,
  description: unknown,
  options: BuildOptions,
): Promise<Package> {
  const pkg = await loadPackage(description, options);

  log("writing '%s' by %s to %s", pkg.title, pkg.author ?? "an unnamed creator", filename);
  await writePackage(filename, pkg);

  return pkg;
}
