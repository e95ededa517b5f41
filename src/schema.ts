import { z, ZodError, ZodTypeAny } from "zod";
import {
  COLLECTION_TYPES,
  DIRECTIONS,
  LAYOUTS,
  ORIENTATIONS,
  SPREADS,
  TITLE_TYPES,
} from "./document";
import { DescriptionError, DescriptionIssue } from "./errors";

const name = z.string().min(1, "must not be empty");

/** Accepts a single value or a non-empty array of them. */
function oneOrMany<T extends ZodTypeAny>(schema: T) {
  return z.union([schema, z.array(schema).min(1, "must not be empty")]);
}

/** Like `oneOrMany`, for lists that may be left empty. */
function oneOrList<T extends ZodTypeAny>(schema: T) {
  return z.union([schema, z.array(schema)]);
}

export const TitleSchema = z.union([
  name,
  z
    .object({
      name,
      type: z.enum(TITLE_TYPES).optional(),
      alternateScript: z.string().optional(),
      fileAs: z.string().optional(),
    })
    .strict(),
]);

export const CreatorSchema = z.union([
  name,
  z
    .object({
      name,
      role: z.string().optional(),
      alternateScript: z.string().optional(),
      fileAs: z.string().optional(),
    })
    .strict(),
]);

export const CollectionSchema = z.union([
  name,
  z
    .object({
      name,
      type: z.enum(COLLECTION_TYPES).optional(),
      position: z.number().int().nonnegative().optional(),
    })
    .strict(),
]);

export const MetadataSchema = z
  .object({
    title: oneOrMany(TitleSchema),
    creator: oneOrList(CreatorSchema).optional(),
    contributor: oneOrList(CreatorSchema).optional(),
    collection: oneOrList(CollectionSchema).optional(),
    language: name,
    identifier: z.string().optional(),
  })
  .strict();

export const StyleSchema = z
  .object({
    href: name,
    src: name,
    link: z.boolean().optional(),
  })
  .strict();

export const RenditionSchema = z
  .object({
    direction: z.enum(DIRECTIONS).optional(),
    layout: z.enum(LAYOUTS).optional(),
    orientation: z.enum(ORIENTATIONS).optional(),
    spread: z.enum(SPREADS).optional(),
    style: oneOrList(StyleSchema).optional(),
  })
  .strict();

export const PageSchema = z.union([
  name,
  z
    .object({
      src: name,
      cover: z.boolean().optional(),
    })
    .strict(),
]);

export const ChapterSchema = z
  .object({
    name: name.optional(),
    page: oneOrMany(PageSchema),
    cover: z.boolean().optional(),
  })
  .strict();

export const BookSchema = z
  .object({
    metadata: MetadataSchema,
    rendition: RenditionSchema.optional(),
    // An empty list passes here and is rejected when the package is built.
    chapter: z.union([ChapterSchema, z.array(ChapterSchema)]),
  })
  .strict();

export type TitleInput = z.infer<typeof TitleSchema>;
export type CreatorInput = z.infer<typeof CreatorSchema>;
export type CollectionInput = z.infer<typeof CollectionSchema>;
export type MetadataInput = z.infer<typeof MetadataSchema>;
export type StyleInput = z.infer<typeof StyleSchema>;
export type RenditionInput = z.infer<typeof RenditionSchema>;
export type PageInput = z.infer<typeof PageSchema>;
export type ChapterInput = z.infer<typeof ChapterSchema>;
export type BookInput = z.infer<typeof BookSchema>;

function toIssues(error: ZodError, prefix: (string | number)[]): DescriptionIssue[] {
  return error.issues.map((issue) => ({
    path: [...prefix, ...issue.path].join("."),
    message: issue.message,
  }));
}

/** Parses `input` with `schema`, turning zod's failure into a `DescriptionError`. */
export function parseWith<T extends ZodTypeAny>(
  schema: T,
  input: unknown,
  prefix: (string | number)[] = [],
): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new DescriptionError(toIssues(result.error, prefix), {
      cause: result.error,
    });
  }

  return result.data;
}

export function toArray<T>(value: T | T[] | undefined): T[] {
  if (value === undefined) {
    return [];
  }

  return Array.isArray(value) ? value : [value];
}
