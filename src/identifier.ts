import { v4 as uuidv4 } from "uuid";

/** Manifest IDs reserved for the cover image and its page. */
export const COVER_IMAGE_ID = "cover";
export const COVER_PAGE_ID = "p-cover";

export const PACKAGE_DOCUMENT_ID = "opf";
export const NAVIGATION_ID = "toc";
export const DEFAULT_STYLE_ID = "s-default";

export type IdPrefix = "i" | "p" | "s";

/**
 * Hands out `<prefix>-NNNN` IDs, counting separately per prefix. IDs depend only
 * on the order of `next` calls, so the same book always gets the same IDs.
 */
export class IdAllocator {
  protected counters = new Map<IdPrefix, number>();

  next(prefix: IdPrefix): string {
    const sequence = (this.counters.get(prefix) ?? 0) + 1;
    this.counters.set(prefix, sequence);

    return `${prefix}-${String(sequence).padStart(4, "0")}`;
  }
}

/** A random `urn:uuid:` identifier for books that do not declare one. */
export function generateIdentifier(): string {
  return `urn:uuid:${uuidv4()}`;
}
