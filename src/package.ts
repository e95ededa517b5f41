import { DepGraph } from "dependency-graph";
import path from "path";
import { Metadata, Rendition, Style } from "./document";
import { DescriptionError, InvariantError, ValidationError } from "./errors";
import {
  DEFAULT_STYLE_ID,
  IdAllocator,
  NAVIGATION_ID,
  PACKAGE_DOCUMENT_ID,
} from "./identifier";
import { extensionFor } from "./image";
import { logger } from "./log";
import { primaryCreator, primaryTitle } from "./metadata";
import { ResolvedChapter, Resource } from "./resolve";
import { styles } from "./styles";

const log = logger("package");

interface ItemBase {
  id: string;

  /** Location relative to the package document's directory. */
  href: string;

  mediaType: string;

  /** Used for the manifest's `properties` attribute, if provided. */
  properties?: string;
}

/** The package document. It is the root of the manifest graph but never listed in it. */
export interface PackageDocumentItem extends ItemBase {
  kind: "package";
}

export interface StyleItem extends ItemBase {
  kind: "style";
  contents: string;

  /** Whether generated pages link to this stylesheet. */
  linked: boolean;
}

export interface ImageItem extends ItemBase {
  kind: "image";

  /** Absolute path of the image file to copy into the archive. */
  source: string;
}

/** The generated XHTML page wrapping one image. */
export interface PageItem extends ItemBase {
  kind: "page";
  image: string;
  width: number;
  height: number;
  cover: boolean;
  styles: string[];
}

export interface NavigationItem extends ItemBase {
  kind: "navigation";
}

export type ManifestItem =
  | PackageDocumentItem
  | StyleItem
  | ImageItem
  | PageItem
  | NavigationItem;

export interface SpineItem {
  idref: string;
  linear: boolean;
  properties?: string;
}

export interface TocEntry {
  label: string;

  /** Manifest ID of the page the entry links to. */
  target: string;
}

export const PACKAGE_DOCUMENT_HREF = "standard.opf";
export const NAVIGATION_HREF = "navigation-documents.xhtml";
const IMAGE_DIRECTORY = "image";
const PAGE_DIRECTORY = "xhtml";
const STYLE_DIRECTORY = "style";

/** A fully-built book, ready to be serialized. */
export class Package {
  constructor(
    readonly metadata: Metadata,
    readonly rendition: Rendition,
    readonly chapters: ResolvedChapter[],
    protected readonly items: DepGraph<ManifestItem>,
    readonly spine: SpineItem[],
    readonly toc: TocEntry[],
    readonly modified: Date,
  ) {}

  get title(): string {
    return primaryTitle(this.metadata).name;
  }

  /** Name of the first creator, if any. */
  get author(): string | undefined {
    return primaryCreator(this.metadata)?.name;
  }

  /** Every manifest item except the package document, in manifest order. */
  get manifest(): ManifestItem[] {
    return this.items
      .dependenciesOf(PACKAGE_DOCUMENT_ID)
      .map((id) => this.items.getNodeData(id));
  }

  get resources(): Resource[] {
    return this.chapters.flatMap(({ resources }) => resources);
  }

  hasItem(id: string): boolean {
    return this.items.hasNode(id);
  }

  item(id: string): ManifestItem {
    if (!this.items.hasNode(id)) {
      throw new InvariantError(`no manifest item with ID '${id}'`);
    }

    return this.items.getNodeData(id);
  }

  page(id: string): PageItem {
    const item = this.item(id);
    if (item.kind !== "page") {
      throw new InvariantError(`manifest item '${id}' is not a page`);
    }

    return item;
  }

  /** The single page marked as the cover. */
  get cover(): PageItem {
    const covers = this.manifest.filter(
      (item): item is PageItem => item.kind === "page" && item.cover,
    );
    if (covers.length !== 1) {
      throw new InvariantError(`expected exactly one cover page, found ${covers.length}`);
    }

    return covers[0];
  }
}

export interface PackageOptions {
  modified: Date;
}

function checkStyleHref(style: Style, index: number) {
  const normalized = path.posix.normalize(style.href);
  if (
    path.posix.isAbsolute(style.href) ||
    normalized.startsWith("..") ||
    normalized !== style.href
  ) {
    throw new DescriptionError([
      {
        path: `rendition.style.${index}.href`,
        message: `'${style.href}' must be a plain relative path`,
      },
    ]);
  }
}

/** Assembles a `Package` from normalized metadata and resolved pages. */
export class PackageBuilder {
  protected items = new DepGraph<ManifestItem>();

  protected spine: SpineItem[] = [];

  protected toc: TocEntry[] = [];

  protected ids = new IdAllocator();

  constructor(
    protected metadata: Metadata,
    protected rendition: Rendition,
    protected chapters: ResolvedChapter[],
  ) {}

  protected addItem(item: ManifestItem, requiredBy?: string): ManifestItem {
    if (this.items.hasNode(item.id)) {
      throw new InvariantError(`duplicate manifest ID '${item.id}'`);
    }

    this.items.addNode(item.id, item);
    if (requiredBy !== undefined) {
      this.addReference(requiredBy, item.id);
    }

    return item;
  }

  protected addReference(from: string, to: string) {
    if (!this.items.hasNode(from) || !this.items.hasNode(to)) {
      throw new InvariantError(`dangling reference from '${from}' to '${to}'`);
    }

    this.items.addDependency(from, to);
  }

  protected addStyles() {
    const declared = this.rendition.style;

    if (declared.length === 0) {
      this.addItem(
        {
          kind: "style",
          id: DEFAULT_STYLE_ID,
          href: path.posix.join(STYLE_DIRECTORY, "default.css"),
          mediaType: "text/css",
          contents: styles.page,
          linked: true,
        },
        PACKAGE_DOCUMENT_ID,
      );
      return;
    }

    const hrefs = new Set<string>();
    declared.forEach((style, index) => {
      checkStyleHref(style, index);
      if (hrefs.has(style.href)) {
        throw new DescriptionError([
          {
            path: `rendition.style.${index}.href`,
            message: `'${style.href}' is declared more than once`,
          },
        ]);
      }
      hrefs.add(style.href);

      this.addItem(
        {
          kind: "style",
          id: this.ids.next("s"),
          href: path.posix.join(STYLE_DIRECTORY, style.href),
          mediaType: "text/css",
          contents: style.src,
          linked: style.link,
        },
        PACKAGE_DOCUMENT_ID,
      );
    });
  }

  protected get linkedStyles(): string[] {
    return this.items
      .dependenciesOf(PACKAGE_DOCUMENT_ID)
      .map((id) => this.items.getNodeData(id))
      .filter((item) => item.kind === "style" && item.linked)
      .map(({ id }) => id);
  }

  protected addPage(resource: Resource, linkedStyles: string[]) {
    const image = this.addItem(
      {
        kind: "image",
        id: resource.imageId,
        href: path.posix.join(
          IMAGE_DIRECTORY,
          `${resource.imageId}${extensionFor(resource.mimeType)}`,
        ),
        mediaType: resource.mimeType,
        properties: resource.cover ? "cover-image" : undefined,
        source: resource.source,
      },
      PACKAGE_DOCUMENT_ID,
    );

    this.addItem(
      {
        kind: "page",
        id: resource.id,
        href: path.posix.join(PAGE_DIRECTORY, `${resource.id}.xhtml`),
        mediaType: "application/xhtml+xml",
        properties: "svg",
        image: image.id,
        width: resource.width,
        height: resource.height,
        cover: resource.cover,
        styles: linkedStyles,
      },
      PACKAGE_DOCUMENT_ID,
    );
    this.addReference(resource.id, image.id);
    linkedStyles.forEach((style) => this.addReference(resource.id, style));

    this.spine.push({
      idref: resource.id,
      linear: true,
      properties: resource.cover ? "rendition:page-spread-center" : undefined,
    });
  }

  protected addChapters() {
    const linkedStyles = this.linkedStyles;

    for (const chapter of this.chapters) {
      log("adding chapter %s", chapter.name ?? "(untitled)");

      chapter.resources.forEach((resource) =>
        this.addPage(resource, linkedStyles),
      );

      const [first] = chapter.resources;
      if (chapter.name !== undefined && first !== undefined) {
        this.toc.push({ label: chapter.name, target: first.id });
      }
    }

    // A navigation document needs at least one entry.
    if (this.toc.length === 0) {
      this.toc.push({
        label: primaryTitle(this.metadata).name,
        target: this.spine[0].idref,
      });
    }
  }

  protected addNavigation() {
    this.addItem(
      {
        kind: "navigation",
        id: NAVIGATION_ID,
        href: NAVIGATION_HREF,
        mediaType: "application/xhtml+xml",
        properties: "nav",
      },
      PACKAGE_DOCUMENT_ID,
    );

    this.toc.forEach(({ target }) => this.addReference(NAVIGATION_ID, target));
  }

  protected validate() {
    const pages = this.chapters.reduce(
      (count, { resources }) => count + resources.length,
      0,
    );
    if (pages === 0) {
      throw new ValidationError("book has no pages: declare at least one chapter with a page");
    }

    const covers = this.chapters
      .flatMap(({ resources }) => resources)
      .filter(({ cover }) => cover);
    if (covers.length !== 1) {
      throw new ValidationError(`book must have exactly one cover page, found ${covers.length}`);
    }
  }

  build(options: PackageOptions): Package {
    this.validate();

    this.items = new DepGraph<ManifestItem>();
    this.spine = [];
    this.toc = [];
    this.ids = new IdAllocator();

    this.items.addNode(PACKAGE_DOCUMENT_ID, {
      kind: "package",
      id: PACKAGE_DOCUMENT_ID,
      href: PACKAGE_DOCUMENT_HREF,
      mediaType: "application/oebps-package+xml",
    });

    this.addStyles();
    this.addChapters();
    this.addNavigation();

    log("built package with %d manifest items", this.items.size() - 1);

    return new Package(
      this.metadata,
      this.rendition,
      this.chapters,
      this.items,
      this.spine,
      this.toc,
      options.modified,
    );
  }
}

export function buildPackage(
  metadata: Metadata,
  rendition: Rendition,
  chapters: ResolvedChapter[],
  options: PackageOptions,
): Package {
  return new PackageBuilder(metadata, rendition, chapters).build(options);
}
