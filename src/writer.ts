import path from "path";
import { create } from "xmlbuilder2";
import { XMLBuilder } from "xmlbuilder2/lib/interfaces";
import { ArchiveEntry, commitArchive } from "./archive";
import { Creator } from "./document";
import { COVER_IMAGE_ID } from "./identifier";
import { logger } from "./log";
import { groupCollections } from "./metadata";
import {
  NAVIGATION_HREF,
  PACKAGE_DOCUMENT_HREF,
  Package,
  PageItem,
} from "./package";
import { toXmlDate } from "./time";

const log = logger("writer");

// [Container file is required to be located here](https://www.w3.org/TR/epub-33/#sec-container-metainf-container.xml)
const OCF_CONTAINER_PATH = "META-INF/container.xml";

const MIMETYPE = "application/epub+zip";

const NS = {
  xhtml: "http://www.w3.org/1999/xhtml",
  epub: "http://www.idpf.org/2007/ops",
  opf: "http://www.idpf.org/2007/opf",
  dc: "http://purl.org/dc/elements/1.1/",
  svg: "http://www.w3.org/2000/svg",
  xlink: "http://www.w3.org/1999/xlink",
  container: "urn:oasis:names:tc:opendocument:xmlns:container",
};

const NAVIGATION_TITLE = "Navigation";

// Version of the Japanese ePub production guide (EBPAJ) the package follows.
const EBPAJ_GUIDE_VERSION = "1.1.3";

/** Renders a `Package` into the files of an ePub and writes them out. */
export class EpubWriter {
  protected package: Package;

  constructor(pkg: Package) {
    this.package = pkg;
  }

  /** The path prefix for everything listed in the manifest, relative to the ePub root. */
  protected get metadataRootPath(): string {
    return "item";
  }

  /** The path to the ePub [Package Document](https://www.w3.org/TR/epub-33/#sec-package-doc), relative to the ePub root. */
  protected get packageDocumentPath(): string {
    return path.posix.join(this.metadataRootPath, PACKAGE_DOCUMENT_HREF);
  }

  /** The path to the navigation (table of contents) XHTML file, relative to the ePub root. */
  protected get navigationPath(): string {
    return path.posix.join(this.metadataRootPath, NAVIGATION_HREF);
  }

  protected get modifiedDateString(): string {
    return toXmlDate(this.package.modified);
  }

  /** Path of a manifest item inside the archive. */
  protected archivePath(href: string): string {
    return path.posix.join(this.metadataRootPath, href);
  }

  /** Creates the OCF container XML file (stored at `META-INF/container.xml`) */
  generateOcfContainerXml(): string {
    const doc = create({
      version: "1.0",
      encoding: "utf-8",
    })
      .ele("container", {
        version: "1.0",
        xmlns: NS.container,
      })
      .ele("rootfiles")
      .ele("rootfile", {
        "full-path": this.packageDocumentPath,
        "media-type": "application/oebps-package+xml",
      });

    return doc.doc().end({ prettyPrint: true });
  }

  protected addRefinement(
    metadata: XMLBuilder,
    refines: string,
    property: string,
    value: string,
    scheme?: string,
  ) {
    metadata
      .ele("meta", { refines: `#${refines}`, property, scheme })
      .txt(value);
  }

  protected addCreators(
    metadata: XMLBuilder,
    element: "dc:creator" | "dc:contributor",
    idPrefix: string,
    creators: Creator[],
  ) {
    creators.forEach((creator, index) => {
      const id = `${idPrefix}${index + 1}`;

      metadata.ele(element, { id }).txt(creator.name);
      if (creator.role !== undefined) {
        this.addRefinement(metadata, id, "role", creator.role, "marc:relators");
      }
      if (creator.alternateScript !== undefined) {
        this.addRefinement(metadata, id, "alternate-script", creator.alternateScript);
      }
      if (creator.fileAs !== undefined) {
        this.addRefinement(metadata, id, "file-as", creator.fileAs);
      }
      this.addRefinement(metadata, id, "display-seq", String(index + 1));
    });
  }

  protected addMetadata(pkg: XMLBuilder) {
    const { metadata: book, rendition } = this.package;

    const metadata = pkg.ele("metadata", {
      "xmlns:dc": NS.dc,
    });

    book.title.forEach((title, index) => {
      const id = `title${index + 1}`;

      metadata.ele("dc:title", { id }).txt(title.name);
      this.addRefinement(metadata, id, "title-type", title.type);
      if (title.alternateScript !== undefined) {
        this.addRefinement(metadata, id, "alternate-script", title.alternateScript);
      }
      if (title.fileAs !== undefined) {
        this.addRefinement(metadata, id, "file-as", title.fileAs);
      }
      this.addRefinement(metadata, id, "display-seq", String(index + 1));
    });

    this.addCreators(metadata, "dc:creator", "creator", book.creator);
    this.addCreators(metadata, "dc:contributor", "contributor", book.contributor);

    // Series come before sets; each keeps its declared order.
    const { series, set } = groupCollections(book);
    [...series, ...set].forEach((collection, index) => {
      const id = `collection${index + 1}`;

      metadata
        .ele("meta", { property: "belongs-to-collection", id })
        .txt(collection.name);
      this.addRefinement(metadata, id, "collection-type", collection.type);
      if (collection.position !== undefined) {
        this.addRefinement(metadata, id, "group-position", String(collection.position));
      }
    });

    metadata.ele("dc:language").txt(book.language);
    metadata.ele("dc:identifier", { id: "unique-id" }).txt(book.identifier);
    metadata
      .ele("meta", { property: "dcterms:modified" })
      .txt(this.modifiedDateString);

    metadata.ele("meta", { property: "rendition:layout" }).txt(rendition.layout);
    metadata
      .ele("meta", { property: "rendition:orientation" })
      .txt(rendition.orientation);
    metadata.ele("meta", { property: "rendition:spread" }).txt(rendition.spread);
    metadata.ele("meta", { property: "ebpaj:guide-version" }).txt(EBPAJ_GUIDE_VERSION);

    // Reading systems that predate ePub 3 find the cover through this.
    metadata.ele("meta", { name: "cover", content: COVER_IMAGE_ID });
  }

  /** Creates the ePub Package Document XML file. */
  generatePackageDocumentXml(): string {
    const doc = create({
      version: "1.0",
      encoding: "utf-8",
    });

    const pkg = doc.ele("package", {
      xmlns: NS.opf,
      version: "3.0",
      "xml:lang": this.package.metadata.language,
      "unique-identifier": "unique-id",
      prefix: "ebpaj: http://www.ebpaj.jp/",
    });

    this.addMetadata(pkg);

    // All resources included in the file.
    const manifest = pkg.ele("manifest");
    for (const item of this.package.manifest) {
      manifest.ele("item", {
        "media-type": item.mediaType,
        id: item.id,
        href: item.href,
        properties: item.properties,
      });
    }

    // Resources in the file that are part of the logical content of the ePub.
    const spine = pkg.ele("spine", {
      "page-progression-direction": this.package.rendition.direction,
    });
    for (const itemref of this.package.spine) {
      spine.ele("itemref", {
        linear: itemref.linear ? "yes" : "no",
        idref: itemref.idref,
        properties: itemref.properties,
      });
    }

    return doc.end({ prettyPrint: true });
  }

  protected createXhtml(title: string): { doc: XMLBuilder; head: XMLBuilder; html: XMLBuilder } {
    const doc = create({
      version: "1.0",
      encoding: "utf-8",
    }).dtd({ name: "html" });

    const html = doc.ele("html", {
      xmlns: NS.xhtml,
      "xmlns:epub": NS.epub,
      "xml:lang": this.package.metadata.language,
      lang: this.package.metadata.language,
    });

    const head = html.ele("head");
    head.ele("meta", { charset: "UTF-8" });
    head.ele("title").txt(title);

    return { doc, head, html };
  }

  /** The navigation document, listing the table of contents. */
  generateNavigationXml(): string {
    const { doc, html } = this.createXhtml(NAVIGATION_TITLE);
    const navigationDirectory = path.posix.dirname(NAVIGATION_HREF);

    const nav = html
      .ele("body")
      .ele("nav", { "epub:type": "toc", id: "toc" });
    nav.ele("h1").txt(NAVIGATION_TITLE);

    const contentsList = nav.ele("ol");
    for (const entry of this.package.toc) {
      const target = this.package.page(entry.target);

      contentsList
        .ele("li")
        .ele("a", { href: path.posix.relative(navigationDirectory, target.href) })
        .txt(entry.label);
    }

    return doc.end({ prettyPrint: true });
  }

  /** The XHTML page displaying a single image, scaled to fill the viewport. */
  generatePageXml(page: PageItem): string {
    const { doc, head, html } = this.createXhtml(this.package.title);
    const pageDirectory = path.posix.dirname(page.href);

    for (const id of page.styles) {
      const style = this.package.item(id);
      head.ele("link", {
        rel: "stylesheet",
        type: style.mediaType,
        href: path.posix.relative(pageDirectory, style.href),
      });
    }

    if (this.package.rendition.layout === "pre-paginated") {
      head.ele("meta", {
        name: "viewport",
        content: `width=${page.width}, height=${page.height}`,
      });
    }

    const image = this.package.item(page.image);

    html
      .ele("body", page.cover ? { "epub:type": "cover" } : {})
      .ele("div", { class: "main" })
      .ele("svg", {
        xmlns: NS.svg,
        "xmlns:xlink": NS.xlink,
        version: "1.1",
        width: "100%",
        height: "100%",
        viewBox: `0 0 ${page.width} ${page.height}`,
      })
      .ele("image", {
        width: String(page.width),
        height: String(page.height),
        "xlink:href": path.posix.relative(pageDirectory, image.href),
      });

    return doc.end({ prettyPrint: true });
  }

  /**
   * Everything that goes into the archive, in order. The `mimetype` file must be
   * first and uncompressed so readers can identify the format from the first bytes.
   */
  entries(): ArchiveEntry[] {
    const entries: ArchiveEntry[] = [
      { name: "mimetype", data: { kind: "text", text: MIMETYPE }, store: true },
      {
        name: OCF_CONTAINER_PATH,
        data: { kind: "text", text: this.generateOcfContainerXml() },
      },
      {
        name: this.packageDocumentPath,
        data: { kind: "text", text: this.generatePackageDocumentXml() },
      },
      {
        name: this.navigationPath,
        data: { kind: "text", text: this.generateNavigationXml() },
      },
    ];

    for (const item of this.package.manifest) {
      const name = this.archivePath(item.href);

      switch (item.kind) {
        case "style":
          entries.push({ name, data: { kind: "text", text: item.contents } });
          break;
        case "image":
          entries.push({ name, data: { kind: "file", path: item.source } });
          break;
        case "page":
          entries.push({ name, data: { kind: "text", text: this.generatePageXml(item) } });
          break;
        case "navigation":
        case "package":
          // Already written above.
          break;
      }
    }

    return entries;
  }

  /** Writes the ePub to `filename`, replacing it only once the archive is complete. */
  async write(filename: string) {
    const entries = this.entries();
    log("writing %d entries to %s", entries.length, filename);

    await commitArchive(entries, filename, { date: this.package.modified });
  }
}
