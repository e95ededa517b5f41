import { existsSync } from "fs";
import { readFile, writeFile } from "fs/promises";
import path from "path";
import { Book, Chapter, Creator, Rendition, Style, Title } from "./document";
import { DescriptionError, ValidationError } from "./errors";
import { generateIdentifier } from "./identifier";
import { DEFAULT_RENDITION } from "./metadata";
import {
  BookInput,
  ChapterInput,
  CreatorInput,
  PageInput,
  RenditionInput,
  StyleInput,
  TitleInput,
} from "./schema";

export const PROJECT_FILE = "pagepress.json";

const COVER_CHAPTER_NAME = "Cover";

/** Looks for the project file in `start` and then in each parent directory. */
export function findProject(start: string): string {
  let current = path.resolve(start);

  for (;;) {
    const candidate = path.join(current, PROJECT_FILE);
    if (existsSync(candidate)) {
      return candidate;
    }

    const parent = path.dirname(current);
    if (parent === current) {
      throw new ValidationError(
        `could not find '${PROJECT_FILE}' in '${start}' or any parent directory`,
      );
    }
    current = parent;
  }
}

/** Reads the raw description from a project file. The result still needs to be parsed. */
export async function readDescription(filename: string): Promise<unknown> {
  const text = await readFile(filename, "utf8");

  try {
    return JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DescriptionError([{ path: "", message: `${filename}: ${message}` }], {
      cause: error,
    });
  }
}

/** Collapses single-element lists, the way a person would write them by hand. */
function compactList<T>(values: T[]): T | T[] {
  return values.length === 1 ? values[0] : values;
}

function compactTitle({ name, type, alternateScript, fileAs }: Title): TitleInput {
  if (type === "main" && alternateScript === undefined && fileAs === undefined) {
    return name;
  }

  return {
    name,
    ...(type !== "main" && { type }),
    ...(alternateScript !== undefined && { alternateScript }),
    ...(fileAs !== undefined && { fileAs }),
  };
}

function compactCreator(creator: Creator): CreatorInput {
  const { name, role, alternateScript, fileAs } = creator;
  if (role === undefined && alternateScript === undefined && fileAs === undefined) {
    return name;
  }

  return creator;
}

function compactStyle({ href, src, link }: Style): StyleInput {
  return { href, src, ...(link && { link }) };
}

function compactRendition(rendition: Rendition): RenditionInput {
  const compact: RenditionInput = {};

  if (rendition.direction !== DEFAULT_RENDITION.direction) {
    compact.direction = rendition.direction;
  }
  if (rendition.layout !== DEFAULT_RENDITION.layout) {
    compact.layout = rendition.layout;
  }
  if (rendition.orientation !== DEFAULT_RENDITION.orientation) {
    compact.orientation = rendition.orientation;
  }
  if (rendition.spread !== DEFAULT_RENDITION.spread) {
    compact.spread = rendition.spread;
  }
  if (rendition.style.length > 0) {
    compact.style = compactList(rendition.style.map(compactStyle));
  }

  return compact;
}

function compactChapter(chapter: Chapter): ChapterInput {
  const pages = chapter.page.map(
    ({ src, cover }): PageInput => (cover ? { src, cover } : src),
  );

  return {
    ...(chapter.name !== undefined && { name: chapter.name }),
    page: compactList(pages),
    ...(chapter.cover && { cover: true }),
  };
}

/** The shortest description that parses back to `book`. */
export function compactDescription(book: Book): BookInput {
  const { metadata } = book;
  const rendition = compactRendition(book.rendition);

  return {
    metadata: {
      title: compactList(metadata.title.map(compactTitle)),
      ...(metadata.creator.length > 0 && {
        creator: compactList(metadata.creator.map(compactCreator)),
      }),
      ...(metadata.contributor.length > 0 && {
        contributor: compactList(metadata.contributor.map(compactCreator)),
      }),
      ...(metadata.collection.length > 0 && {
        collection: compactList(metadata.collection),
      }),
      language: metadata.language,
      identifier: metadata.identifier,
    },
    ...(Object.keys(rendition).length > 0 && { rendition }),
    chapter: compactList(book.chapter.map(compactChapter)),
  };
}

export async function writeDescription(filename: string, book: Book) {
  await writeFile(
    filename,
    `${JSON.stringify(compactDescription(book), null, 2)}\n`,
  );
}

export interface ScaffoldOptions {
  title: string;

  /** Name of the chapter holding every page after the cover. Left unnamed when absent. */
  chapterName?: string;

  author?: string;
  identifier?: string;
  language: string;

  /** Page images; the first becomes the cover. */
  files: string[];
}

/**
 * Groups `files` into chapters: the first file alone in a cover chapter, the
 * rest in a chapter called `name`.
 */
export function createChapters(name: string | undefined, files: string[]): Chapter[] {
  const [cover, ...rest] = files;
  const chapters: Chapter[] = [];

  if (cover !== undefined) {
    chapters.push({
      name: COVER_CHAPTER_NAME,
      page: [{ src: cover, cover: false }],
      cover: true,
    });
  }

  if (rest.length > 0) {
    chapters.push({
      ...(name !== undefined && { name }),
      page: rest.map((src) => ({ src, cover: false })),
      cover: false,
    });
  }

  return chapters;
}

/** A new book description, as written by `pagepress new`. */
export function scaffoldBook(options: ScaffoldOptions): Book {
  return {
    metadata: {
      title: [{ name: options.title, type: "main" }],
      creator:
        options.author !== undefined ? [{ name: options.author, role: "aut" }] : [],
      contributor: [],
      collection: [],
      language: options.language,
      identifier: options.identifier ?? generateIdentifier(),
    },
    rendition: {
      ...DEFAULT_RENDITION,
      orientation: "portrait",
      style: [],
    },
    chapter: createChapters(options.chapterName, options.files),
  };
}
