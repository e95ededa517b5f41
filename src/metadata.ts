import {
  Book,
  Chapter,
  Collection,
  Creator,
  Metadata,
  Page,
  Rendition,
  Style,
  Title,
} from "./document";
import { generateIdentifier } from "./identifier";
import {
  BookSchema,
  ChapterInput,
  CollectionInput,
  CreatorInput,
  MetadataInput,
  MetadataSchema,
  PageInput,
  RenditionInput,
  RenditionSchema,
  StyleInput,
  TitleInput,
  parseWith,
  toArray,
} from "./schema";

export const DEFAULT_RENDITION: Readonly<Omit<Rendition, "style">> = {
  direction: "rtl",
  layout: "pre-paginated",
  orientation: "auto",
  spread: "auto",
};

function normalizeTitle(input: TitleInput): Title {
  if (typeof input === "string") {
    return { name: input, type: "main" };
  }

  const { name, type, alternateScript, fileAs } = input;
  return {
    name,
    type: type ?? "main",
    ...(alternateScript !== undefined && { alternateScript }),
    ...(fileAs !== undefined && { fileAs }),
  };
}

function normalizeCreator(input: CreatorInput): Creator {
  if (typeof input === "string") {
    return { name: input };
  }

  const { name, role, alternateScript, fileAs } = input;
  return {
    name,
    ...(role !== undefined && { role }),
    ...(alternateScript !== undefined && { alternateScript }),
    ...(fileAs !== undefined && { fileAs }),
  };
}

function normalizeCollection(input: CollectionInput): Collection {
  if (typeof input === "string") {
    return { name: input, type: "series" };
  }

  const { name, type, position } = input;
  return {
    name,
    type: type ?? "series",
    ...(position !== undefined && { position }),
  };
}

function fromMetadataInput(input: MetadataInput): Metadata {
  return {
    title: toArray(input.title).map(normalizeTitle),
    creator: toArray(input.creator).map(normalizeCreator),
    contributor: toArray(input.contributor).map(normalizeCreator),
    collection: toArray(input.collection).map(normalizeCollection),
    language: input.language,
    // An empty identifier counts as absent; a declared one is kept verbatim.
    identifier: input.identifier || generateIdentifier(),
  };
}

function normalizeStyle({ href, src, link }: StyleInput): Style {
  return { href, src, link: link ?? false };
}

function fromRenditionInput(input: RenditionInput = {}): Rendition {
  return {
    direction: input.direction ?? DEFAULT_RENDITION.direction,
    layout: input.layout ?? DEFAULT_RENDITION.layout,
    orientation: input.orientation ?? DEFAULT_RENDITION.orientation,
    spread: input.spread ?? DEFAULT_RENDITION.spread,
    style: toArray(input.style).map(normalizeStyle),
  };
}

function normalizePage(input: PageInput): Page {
  if (typeof input === "string") {
    return { src: input, cover: false };
  }

  return { src: input.src, cover: input.cover ?? false };
}

function normalizeChapter(input: ChapterInput): Chapter {
  return {
    ...(input.name !== undefined && { name: input.name }),
    page: toArray(input.page).map(normalizePage),
    cover: input.cover ?? false,
  };
}

/**
 * Expands a loosely-shaped metadata description into canonical `Metadata`.
 * Canonical metadata normalizes to itself.
 */
export function normalizeMetadata(input: unknown): Metadata {
  return fromMetadataInput(parseWith(MetadataSchema, input, ["metadata"]));
}

/** Applies rendition defaults. `undefined` yields the defaults. */
export function normalizeRendition(input: unknown): Rendition {
  return fromRenditionInput(
    parseWith(RenditionSchema.optional(), input, ["rendition"]),
  );
}

/** Validates a whole book description and returns its canonical form. */
export function parseDescription(input: unknown): Book {
  const book = parseWith(BookSchema, input);

  return {
    metadata: fromMetadataInput(book.metadata),
    rendition: fromRenditionInput(book.rendition),
    chapter: toArray(book.chapter).map(normalizeChapter),
  };
}

/** The first title typed `main`, falling back to the first title. */
export function primaryTitle(metadata: Metadata): Title {
  const [first] = metadata.title;
  return metadata.title.find(({ type }) => type === "main") ?? first;
}

/** The first declared creator. */
export function primaryCreator(metadata: Metadata): Creator | undefined {
  return metadata.creator[0];
}

/** Splits collections by kind, keeping declared order within each kind. */
export function groupCollections(metadata: Metadata): {
  series: Collection[];
  set: Collection[];
} {
  return {
    series: metadata.collection.filter(({ type }) => type === "series"),
    set: metadata.collection.filter(({ type }) => type === "set"),
  };
}
