import { Rendition } from "./document";
import { DescriptionError, InvariantError, ValidationError } from "./errors";
import { DEFAULT_RENDITION, normalizeMetadata } from "./metadata";
import { buildPackage } from "./package";
import { ResolvedChapter } from "./resolve";
import { resource } from "./test-helpers";

const MODIFIED = new Date("2024-01-02T03:04:05Z");

const metadata = normalizeMetadata({
  title: "Sample",
  language: "en",
  identifier: "urn:uuid:00000000-0000-4000-8000-000000000000",
});

const rendition: Rendition = { ...DEFAULT_RENDITION, style: [] };

function sampleChapters(): ResolvedChapter[] {
  return [
    { name: "Cover", resources: [resource("p-cover", "cover", { cover: true })] },
    {
      name: "One",
      resources: [
        resource("p-0001", "i-0001"),
        resource("p-0002", "i-0002", { mimeType: "image/jpeg", src: "i-0002.jpg" }),
      ],
    },
  ];
}

describe("buildPackage", () => {
  it("should list the manifest in a stable order", () => {
    const pkg = buildPackage(metadata, rendition, sampleChapters(), { modified: MODIFIED });

    expect(pkg.manifest.map(({ id, href }) => [id, href])).toEqual([
      ["s-default", "style/default.css"],
      ["cover", "image/cover.png"],
      ["p-cover", "xhtml/p-cover.xhtml"],
      ["i-0001", "image/i-0001.png"],
      ["p-0001", "xhtml/p-0001.xhtml"],
      ["i-0002", "image/i-0002.jpg"],
      ["p-0002", "xhtml/p-0002.xhtml"],
      ["toc", "navigation-documents.xhtml"],
    ]);
    expect(pkg.modified).toBe(MODIFIED);
  });

  it("should describe each item", () => {
    const pkg = buildPackage(metadata, rendition, sampleChapters(), { modified: MODIFIED });

    expect(pkg.item("cover")).toEqual({
      kind: "image",
      id: "cover",
      href: "image/cover.png",
      mediaType: "image/png",
      properties: "cover-image",
      source: "/book/cover.png",
    });
    expect(pkg.item("i-0002")).toMatchObject({ mediaType: "image/jpeg" });
    expect(pkg.item("i-0002").properties).toBeUndefined();
    expect(pkg.page("p-0001")).toEqual({
      kind: "page",
      id: "p-0001",
      href: "xhtml/p-0001.xhtml",
      mediaType: "application/xhtml+xml",
      properties: "svg",
      image: "i-0001",
      width: 600,
      height: 800,
      cover: false,
      styles: ["s-default"],
    });
    expect(pkg.item("toc")).toEqual({
      kind: "navigation",
      id: "toc",
      href: "navigation-documents.xhtml",
      mediaType: "application/xhtml+xml",
      properties: "nav",
    });
  });

  it("should never list the package document", () => {
    const pkg = buildPackage(metadata, rendition, sampleChapters(), { modified: MODIFIED });

    expect(pkg.hasItem("opf")).toBe(true);
    expect(pkg.manifest.some(({ kind }) => kind === "package")).toBe(false);
  });

  it("should center the cover in the spine", () => {
    const pkg = buildPackage(metadata, rendition, sampleChapters(), { modified: MODIFIED });

    expect(pkg.spine).toEqual([
      { idref: "p-cover", linear: true, properties: "rendition:page-spread-center" },
      { idref: "p-0001", linear: true },
      { idref: "p-0002", linear: true },
    ]);
    expect(pkg.cover.id).toBe("p-cover");
  });

  it("should link each named chapter from the table of contents", () => {
    const pkg = buildPackage(metadata, rendition, sampleChapters(), { modified: MODIFIED });

    expect(pkg.toc).toEqual([
      { label: "Cover", target: "p-cover" },
      { label: "One", target: "p-0001" },
    ]);
  });

  it("should fall back to the title when no chapter is named", () => {
    const pkg = buildPackage(
      metadata,
      rendition,
      [
        {
          resources: [
            resource("p-cover", "cover", { cover: true }),
            resource("p-0001", "i-0001"),
          ],
        },
      ],
      { modified: MODIFIED },
    );

    expect(pkg.toc).toEqual([{ label: "Sample", target: "p-cover" }]);
  });

  it("should use declared styles instead of the default one", () => {
    const pkg = buildPackage(
      metadata,
      {
        ...rendition,
        style: [
          { href: "page.css", src: "body { margin: 0; }", link: true },
          { href: "print/extra.css", src: "img { width: 100%; }", link: false },
        ],
      },
      sampleChapters(),
      { modified: MODIFIED },
    );

    expect(pkg.hasItem("s-default")).toBe(false);
    expect(pkg.item("s-0001")).toEqual({
      kind: "style",
      id: "s-0001",
      href: "style/page.css",
      mediaType: "text/css",
      contents: "body { margin: 0; }",
      linked: true,
    });
    expect(pkg.item("s-0002").href).toBe("style/print/extra.css");
    expect(pkg.page("p-cover").styles).toEqual(["s-0001"]);
  });

  it("should reject style paths that leave the style directory", () => {
    let error: unknown;
    try {
      buildPackage(
        metadata,
        { ...rendition, style: [{ href: "../escape.css", src: "", link: false }] },
        sampleChapters(),
        { modified: MODIFIED },
      );
    } catch (caught) {
      error = caught;
    }

    expect(error).toBeInstanceOf(DescriptionError);
    expect(error).toHaveProperty("issues", [
      {
        path: "rendition.style.0.href",
        message: "'../escape.css' must be a plain relative path",
      },
    ]);
  });

  it("should reject a style declared twice", () => {
    expect(() =>
      buildPackage(
        metadata,
        {
          ...rendition,
          style: [
            { href: "page.css", src: "", link: true },
            { href: "page.css", src: "", link: false },
          ],
        },
        sampleChapters(),
        { modified: MODIFIED },
      ),
    ).toThrow(
      "invalid book description: rendition.style.1.href: 'page.css' is declared more than once",
    );
  });

  it("should reject a book without pages", () => {
    const message = "book has no pages: declare at least one chapter with a page";

    expect(() => buildPackage(metadata, rendition, [], { modified: MODIFIED })).toThrow(
      new ValidationError(message),
    );
    expect(() =>
      buildPackage(metadata, rendition, [{ name: "Empty", resources: [] }], {
        modified: MODIFIED,
      }),
    ).toThrow(new ValidationError(message));
  });

  it("should require exactly one cover", () => {
    expect(() =>
      buildPackage(metadata, rendition, [{ resources: [resource("p-0001", "i-0001")] }], {
        modified: MODIFIED,
      }),
    ).toThrow("book must have exactly one cover page, found 0");
  });

  it("should reject colliding manifest IDs", () => {
    expect(() =>
      buildPackage(
        metadata,
        rendition,
        [
          {
            resources: [
              resource("p-cover", "cover", { cover: true }),
              resource("p-0001", "i-0001"),
              resource("p-0001", "i-0002"),
            ],
          },
        ],
        { modified: MODIFIED },
      ),
    ).toThrow(new InvariantError("duplicate manifest ID 'p-0001'"));
  });
});

describe("Package", () => {
  const pkg = buildPackage(metadata, rendition, sampleChapters(), { modified: MODIFIED });

  it("should expose the primary title", () => {
    expect(pkg.title).toBe("Sample");
  });

  it("should expose the first creator as the author", () => {
    const credited = buildPackage(
      normalizeMetadata({
        title: "Sample",
        creator: ["Jane Doe", { name: "Ann Artist", role: "ill" }],
        language: "en",
        identifier: "urn:uuid:00000000-0000-4000-8000-000000000000",
      }),
      rendition,
      sampleChapters(),
      { modified: MODIFIED },
    );

    expect(credited.author).toBe("Jane Doe");
    expect(pkg.author).toBeUndefined();
  });

  it("should list resources in reading order", () => {
    expect(pkg.resources.map(({ id }) => id)).toEqual(["p-cover", "p-0001", "p-0002"]);
  });

  it("should refuse unknown or mistyped lookups", () => {
    expect(() => pkg.item("p-0099")).toThrow(
      new InvariantError("no manifest item with ID 'p-0099'"),
    );
    expect(() => pkg.page("cover")).toThrow(
      new InvariantError("manifest item 'cover' is not a page"),
    );
  });
});
