import { DescriptionError } from "./errors";
import {
  groupCollections,
  normalizeMetadata,
  normalizeRendition,
  parseDescription,
  primaryCreator,
  primaryTitle,
} from "./metadata";

const IDENTIFIER = "urn:uuid:6d1c1f0e-58a4-4d47-9a3e-0c4b7e2f9a10";

function descriptionError(fn: () => unknown): DescriptionError {
  try {
    fn();
  } catch (error) {
    if (error instanceof DescriptionError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a DescriptionError");
}

describe("normalizeMetadata", () => {
  it("should promote bare strings to structured entries", () => {
    expect(
      normalizeMetadata({
        title: "Sample",
        creator: "Jane Doe",
        contributor: "John Roe",
        collection: "Night Trains",
        language: "en",
        identifier: IDENTIFIER,
      }),
    ).toEqual({
      title: [{ name: "Sample", type: "main" }],
      creator: [{ name: "Jane Doe" }],
      contributor: [{ name: "John Roe" }],
      collection: [{ name: "Night Trains", type: "series" }],
      language: "en",
      identifier: IDENTIFIER,
    });
  });

  it("should normalize shorthand and structured forms to the same entries", () => {
    const shorthand = normalizeMetadata({
      title: "Sample",
      creator: "Jane Doe",
      language: "en",
      identifier: IDENTIFIER,
    });
    const structured = normalizeMetadata({
      title: [{ name: "Sample", type: "main" }],
      creator: [{ name: "Jane Doe" }],
      language: "en",
      identifier: IDENTIFIER,
    });

    expect(shorthand).toEqual(structured);
  });

  it("should keep declared order and default each element", () => {
    const metadata = normalizeMetadata({
      title: [
        { name: "Volume One", type: "subtitle" },
        "Sample",
        { name: "Sample", fileAs: "Sample, The", alternateScript: "サンプル" },
      ],
      creator: ["Jane Doe", { name: "Ann Artist", role: "ill" }],
      language: "ja",
      identifier: IDENTIFIER,
    });

    expect(metadata.title).toEqual([
      { name: "Volume One", type: "subtitle" },
      { name: "Sample", type: "main" },
      {
        name: "Sample",
        type: "main",
        alternateScript: "サンプル",
        fileAs: "Sample, The",
      },
    ]);
    expect(metadata.creator).toEqual([
      { name: "Jane Doe" },
      { name: "Ann Artist", role: "ill" },
    ]);
    expect(primaryTitle(metadata)).toEqual({ name: "Sample", type: "main" });
  });

  it("should be idempotent", () => {
    const once = normalizeMetadata({
      title: ["Sample", { name: "Extra", type: "edition" }],
      creator: { name: "Jane Doe", role: "aut", fileAs: "Doe, Jane" },
      collection: [{ name: "Night Trains", type: "set", position: 2 }],
      language: "en",
    });

    expect(normalizeMetadata(once)).toEqual(once);
  });

  it("should accept its own output when the optional lists are empty", () => {
    const once = normalizeMetadata({ title: "Sample", language: "en", identifier: IDENTIFIER });

    expect(once).toEqual({
      title: [{ name: "Sample", type: "main" }],
      creator: [],
      contributor: [],
      collection: [],
      language: "en",
      identifier: IDENTIFIER,
    });
    expect(normalizeMetadata(once)).toEqual(once);
  });

  it("should generate an identifier when none is declared", () => {
    const uuid =
      /^urn:uuid:[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

    expect(normalizeMetadata({ title: "Sample", language: "en" }).identifier).toMatch(uuid);
    expect(
      normalizeMetadata({ title: "Sample", language: "en", identifier: "" }).identifier,
    ).toMatch(uuid);
  });

  it("should never replace a declared identifier", () => {
    expect(
      normalizeMetadata({ title: "Sample", language: "en", identifier: "isbn:0000" })
        .identifier,
    ).toBe("isbn:0000");
  });

  it("should name a missing language", () => {
    const error = descriptionError(() => normalizeMetadata({ title: "Sample" }));

    expect(error.issues).toEqual([{ path: "metadata.language", message: "Required" }]);
  });

  it("should reject an empty language", () => {
    const error = descriptionError(() =>
      normalizeMetadata({ title: "Sample", language: "" }),
    );

    expect(error.issues).toEqual([
      { path: "metadata.language", message: "must not be empty" },
    ]);
  });

  it("should reject a negative collection position", () => {
    const error = descriptionError(() =>
      normalizeMetadata({
        title: "Sample",
        language: "en",
        collection: { name: "Night Trains", position: -1 },
      }),
    );

    expect(error.issues.map(({ path }) => path)).toEqual([
      "metadata.collection.position",
    ]);
  });

  it("should reject an unknown title type", () => {
    expect(() =>
      normalizeMetadata({
        title: { name: "Sample", type: "prologue" },
        language: "en",
      }),
    ).toThrow(DescriptionError);
  });
});

describe("primaryCreator", () => {
  it("should return the first declared creator", () => {
    const metadata = normalizeMetadata({
      title: "Sample",
      creator: [{ name: "Jane Doe", role: "aut" }, "Ann Artist"],
      language: "en",
      identifier: IDENTIFIER,
    });

    expect(primaryCreator(metadata)).toEqual({ name: "Jane Doe", role: "aut" });
  });

  it("should return nothing without creators", () => {
    const metadata = normalizeMetadata({ title: "Sample", language: "en", identifier: IDENTIFIER });

    expect(primaryCreator(metadata)).toBeUndefined();
  });
});

describe("groupCollections", () => {
  it("should split collections by kind in declared order", () => {
    const metadata = normalizeMetadata({
      title: "Sample",
      language: "en",
      collection: [
        { name: "Box", type: "set" },
        { name: "Night Trains", position: 3 },
        { name: "Omnibus", type: "set", position: 3 },
        "Day Trains",
      ],
    });

    expect(groupCollections(metadata)).toEqual({
      series: [
        { name: "Night Trains", type: "series", position: 3 },
        { name: "Day Trains", type: "series" },
      ],
      set: [
        { name: "Box", type: "set" },
        { name: "Omnibus", type: "set", position: 3 },
      ],
    });
  });
});

describe("normalizeRendition", () => {
  it("should apply defaults", () => {
    expect(normalizeRendition(undefined)).toEqual({
      direction: "rtl",
      layout: "pre-paginated",
      orientation: "auto",
      spread: "auto",
      style: [],
    });
  });

  it("should accept its own defaults", () => {
    const once = normalizeRendition(undefined);

    expect(normalizeRendition(once)).toEqual(once);
  });

  it("should keep declared values", () => {
    expect(
      normalizeRendition({
        direction: "ltr",
        spread: "none",
        style: { href: "extra.css", src: "body { margin: 0; }" },
      }),
    ).toEqual({
      direction: "ltr",
      layout: "pre-paginated",
      orientation: "auto",
      spread: "none",
      style: [{ href: "extra.css", src: "body { margin: 0; }", link: false }],
    });
  });

  it("should name a malformed value", () => {
    const error = descriptionError(() => normalizeRendition({ direction: "up" }));

    expect(error.issues.map(({ path }) => path)).toEqual(["rendition.direction"]);
  });
});

describe("parseDescription", () => {
  const metadata = { title: "Sample", language: "en", identifier: IDENTIFIER };

  it("should accept a single chapter with shorthand pages", () => {
    const book = parseDescription({
      metadata,
      chapter: { name: "One", page: "a.png" },
    });

    expect(book.chapter).toEqual([
      { name: "One", page: [{ src: "a.png", cover: false }], cover: false },
    ]);
    expect(book.rendition.direction).toBe("rtl");
  });

  it("should accept cover flags on chapters and pages", () => {
    const book = parseDescription({
      metadata,
      chapter: [
        { page: ["a.png", { src: "b.png", cover: true }] },
        { page: "c.png", cover: true },
      ],
    });

    expect(book.chapter).toEqual([
      {
        page: [
          { src: "a.png", cover: false },
          { src: "b.png", cover: true },
        ],
        cover: false,
      },
      { page: [{ src: "c.png", cover: false }], cover: true },
    ]);
  });

  it("should accept an empty chapter list", () => {
    expect(parseDescription({ metadata, chapter: [] }).chapter).toEqual([]);
  });

  it("should reject unknown top-level fields", () => {
    const error = descriptionError(() =>
      parseDescription({ metadata, chapter: { page: "a.png" }, extra: true }),
    );

    expect(error.issues).toEqual([
      { path: "", message: "Unrecognized key(s) in object: 'extra'" },
    ]);
  });

  it("should require metadata and chapters", () => {
    const error = descriptionError(() => parseDescription({}));

    expect(error.issues.map(({ path }) => path)).toEqual(["metadata", "chapter"]);
  });

  it("should reject a chapter without pages", () => {
    const error = descriptionError(() =>
      parseDescription({ metadata, chapter: { name: "Empty" } }),
    );

    expect(error.message).toMatch(/^invalid book description: chapter/);
  });
});
