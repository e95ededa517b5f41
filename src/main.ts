#!/usr/bin/env node
import { Command } from "commander";
import { BuildCommandOptions, NewOptions, runBuild, runNew } from "./commands";
import { enableLogging } from "./log";

const program = new Command();

program
  .name("pagepress")
  .description("Build fixed-layout ePub books from page images.")
  .option("-v, --verbose", "log every step of the build")
  .hook("preAction", (command) => {
    enableLogging(command.opts<{ verbose?: boolean }>().verbose === true);
  });

program
  .command("new")
  .description("Create a new book in the current directory.")
  .argument("[files...]", "page images; the first becomes the cover")
  .option("-t, --title <title>", "main title of the book")
  .option("-a, --author <name>", "author of the book")
  .option("-i, --identifier <urn>", "identifier of the book")
  .option("-f, --force", "replace an existing project file")
  .action(async (files: string[], options: NewOptions) => {
    const filename = await runNew(process.cwd(), files, options);
    console.log(`created ${filename}`);
  });

program
  .command("build")
  .description("Build the current book.")
  .option("-o, --output <path>", "output ePub file, or directory to write it in")
  .action(async (options: BuildCommandOptions) => {
    const filename = await runBuild(process.cwd(), options);
    console.log(`wrote ${filename}`);
  });

async function main() {
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(`error: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
