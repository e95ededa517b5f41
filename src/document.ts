export const TITLE_TYPES = [
  "main",
  "subtitle",
  "short",
  "collection",
  "edition",
  "expanded",
] as const;

export const COLLECTION_TYPES = ["series", "set"] as const;

export const DIRECTIONS = ["rtl", "ltr"] as const;

export const LAYOUTS = ["reflowable", "pre-paginated"] as const;

export const ORIENTATIONS = ["landscape", "portrait", "auto"] as const;

export const SPREADS = ["none", "landscape", "both", "auto"] as const;

export type TitleType = (typeof TITLE_TYPES)[number];
export type CollectionType = (typeof COLLECTION_TYPES)[number];
export type Direction = (typeof DIRECTIONS)[number];
export type Layout = (typeof LAYOUTS)[number];
export type Orientation = (typeof ORIENTATIONS)[number];
export type Spread = (typeof SPREADS)[number];

/** One of the book's [titles](https://www.w3.org/TR/epub-33/#sec-opf-dctitle). */
export interface Title {
  name: string;

  type: TitleType;

  /** The title written in another script, e.g. a romanized form. */
  alternateScript?: string;

  /** The form used when sorting, e.g. "Hobbit, The". */
  fileAs?: string;
}

/** A creator or contributor. */
export interface Creator {
  name: string;

  /** A [MARC relator](https://www.loc.gov/marc/relators/relaterm.html) code such as "aut" or "ill". */
  role?: string;

  alternateScript?: string;

  fileAs?: string;
}

export interface Collection {
  name: string;

  type: CollectionType;

  /** Position of this book within the collection. */
  position?: number;
}

export interface Metadata {
  /** Always holds at least one entry; the first `main` title is the primary one. */
  title: Title[];

  creator: Creator[];

  contributor: Creator[];

  collection: Collection[];

  /** A language tag that conforms to [RFC 5646](https://datatracker.ietf.org/doc/html/rfc5646). This can be something like "en" or "en-US". */
  language: string;

  /** A globally unique [identifier for this book](https://idpf.org/epub/30/spec/epub30-publications.html#sec-opf-dcidentifier). */
  identifier: string;
}

/** An auxiliary stylesheet attached to the generated pages. */
export interface Style {
  /** Filename of the stylesheet inside the ePub's style directory. */
  href: string;

  /** The stylesheet text. */
  src: string;

  /** Whether every generated page links to this stylesheet. */
  link: boolean;
}

export interface Rendition {
  direction: Direction;
  layout: Layout;
  orientation: Orientation;
  spread: Spread;
  style: Style[];
}

export interface Page {
  /** Path to the page image, relative to the project root. */
  src: string;

  cover: boolean;
}

/** A group of pages. Named chapters appear in the table of contents. */
export interface Chapter {
  name?: string;

  page: Page[];

  /** Marks the first page of this chapter as the cover. */
  cover: boolean;
}

export interface Book {
  metadata: Metadata;
  rendition: Rendition;
  chapter: Chapter[];
}
