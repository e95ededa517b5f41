import { existsSync } from "fs";
import path from "path";
import { defaultLanguage } from "./config";
import { ValidationError } from "./errors";
import { logger } from "./log";
import { PROJECT_FILE, findProject, readDescription, scaffoldBook, writeDescription } from "./project";
import { BuildOptions, loadPackage, resolveOutputPath, writePackage } from "./write";

const log = logger("cli");

export interface NewOptions {
  title?: string;
  author?: string;
  identifier?: string;
  force?: boolean;
}

/** Writes a new project file into `cwd` and returns its path. */
export async function runNew(
  cwd: string,
  files: string[],
  options: NewOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<string> {
  const filename = path.join(cwd, PROJECT_FILE);
  if (existsSync(filename) && !options.force) {
    throw new ValidationError(`'${filename}' already exists; pass --force to replace it`);
  }

  const book = scaffoldBook({
    title: options.title ?? path.basename(path.resolve(cwd)),
    chapterName: options.title,
    author: options.author,
    identifier: options.identifier,
    language: defaultLanguage(env),
    files,
  });

  await writeDescription(filename, book);
  log("created %s with %d pages", filename, files.length);

  return filename;
}

export interface BuildCommandOptions {
  output?: string;
}

/** Builds the project enclosing `cwd` and returns the path of the written archive. */
export async function runBuild(
  cwd: string,
  options: BuildCommandOptions,
  overrides: Partial<BuildOptions> = {},
): Promise<string> {
  const projectFile = findProject(cwd);
  const root = path.dirname(projectFile);
  log("building %s", projectFile);

  const description = await readDescription(projectFile);
  const pkg = await loadPackage(description, {
    root,
    sources: [projectFile],
    ...overrides,
  });

  const output = resolveOutputPath(
    pkg.title,
    options.output === undefined ? undefined : path.resolve(cwd, options.output),
    root,
  );
  await writePackage(output, pkg);

  return output;
}
