import path from "path";
import { Chapter, Orientation } from "./document";
import { ResolutionError, ValidationError } from "./errors";
import {
  COVER_IMAGE_ID,
  COVER_PAGE_ID,
  IdAllocator,
} from "./identifier";
import { ImageInfo, ImageProbe, isSupportedImageType } from "./image";
import { logger, warn } from "./log";

const log = logger("resolve");

/** A page image with everything the package needs to know about it. */
export interface Resource {
  /** Manifest ID of the generated wrapper page. */
  id: string;

  /** Manifest ID of the image itself. */
  imageId: string;

  /** The page path as declared in the description. */
  src: string;

  /** Absolute path of the image file. */
  source: string;

  mimeType: string;
  width: number;
  height: number;
  cover: boolean;
}

export interface ResolvedChapter {
  name?: string;
  resources: Resource[];
}

/** Position of a page within the book. */
export interface PageLocation {
  chapter: number;
  page: number;
}

export interface ResolveOptions {
  /** Directory page paths are relative to. */
  root: string;

  probe: ImageProbe;

  orientation?: Orientation;
}

/**
 * Finds the cover page. An explicit flag on a chapter (meaning its first page)
 * or on a page wins; otherwise the first page of the first chapter is the
 * cover. More than one flag is an error. Returns `undefined` for a book with
 * no pages.
 */
export function locateCover(chapters: Chapter[]): PageLocation | undefined {
  const flagged: PageLocation[] = [];

  chapters.forEach((chapter, chapterIndex) => {
    if (chapter.cover) {
      flagged.push({ chapter: chapterIndex, page: 0 });
    }

    chapter.page.forEach((page, pageIndex) => {
      if (page.cover) {
        flagged.push({ chapter: chapterIndex, page: pageIndex });
      }
    });
  });

  if (flagged.length > 1) {
    const where = flagged
      .map(({ chapter, page }) => `chapter ${chapter + 1} page ${page + 1}`)
      .join(", ");
    throw new ValidationError(
      `only one cover may be declared, found ${flagged.length}: ${where}`,
    );
  }

  if (flagged.length === 1) {
    return flagged[0];
  }

  const first = chapters.findIndex((chapter) => chapter.page.length > 0);
  return first === -1 ? undefined : { chapter: first, page: 0 };
}

function checkOrientation(src: string, info: ImageInfo, orientation?: Orientation) {
  if (orientation === "portrait" && info.height < info.width) {
    warn("'%s' is a landscape page in a portrait book", src);
  } else if (orientation === "landscape" && info.width < info.height) {
    warn("'%s' is a portrait page in a landscape book", src);
  }
}

/**
 * Resolves every page into a `Resource`. Images are probed concurrently, but
 * the result, IDs included, follows declaration order.
 */
export async function resolvePages(
  chapters: Chapter[],
  options: ResolveOptions,
): Promise<ResolvedChapter[]> {
  const cover = locateCover(chapters);

  const pages = chapters.flatMap((chapter, chapterIndex) =>
    chapter.page.map((page, pageIndex) => ({
      chapter: chapterIndex,
      src: page.src,
      source: path.resolve(options.root, page.src),
      cover: cover?.chapter === chapterIndex && cover.page === pageIndex,
    })),
  );

  log("probing %d page images", pages.length);
  const probed = await Promise.allSettled(
    pages.map(({ source }) => options.probe(source)),
  );

  const ids = new IdAllocator();
  const resolved: ResolvedChapter[] = chapters.map(({ name }) => ({
    ...(name !== undefined && { name }),
    resources: [],
  }));

  pages.forEach((page, index) => {
    const result = probed[index];
    if (result.status === "rejected") {
      const reason =
        result.reason instanceof Error ? result.reason.message : String(result.reason);
      throw new ResolutionError(page.src, reason, { cause: result.reason });
    }

    const info = result.value;
    if (!isSupportedImageType(info.mimeType)) {
      throw new ResolutionError(
        page.src,
        `unsupported media type '${info.mimeType}'`,
      );
    }

    checkOrientation(page.src, info, options.orientation);

    const resource: Resource = {
      id: page.cover ? COVER_PAGE_ID : ids.next("p"),
      imageId: page.cover ? COVER_IMAGE_ID : ids.next("i"),
      src: page.src,
      source: page.source,
      mimeType: info.mimeType,
      width: info.width,
      height: info.height,
      cover: page.cover,
    };

    log("resolved '%s' as %s (%dx%d)", page.src, resource.id, info.width, info.height);
    resolved[page.chapter].resources.push(resource);
  });

  return resolved;
}
