import { readFile } from "fs/promises";
import JSZip from "jszip";
import path from "path";
import sharp from "sharp";
import { ImageInfo, ImageProbe } from "./image";
import { Resource } from "./resolve";

/** Writes a blank image; the format follows the file extension. */
export async function createImage(
  directory: string,
  name: string,
  width: number,
  height: number,
): Promise<string> {
  const filename = path.join(directory, name);

  await sharp({
    create: {
      width,
      height,
      channels: 3,
      background: { r: 240, g: 240, b: 240 },
    },
  }).toFile(filename);

  return filename;
}

/** A probe answering from a table keyed by file name. */
export function tableProbe(table: Record<string, ImageInfo>): ImageProbe {
  return async (filename) => {
    const info = table[path.basename(filename)];
    if (info === undefined) {
      throw new Error(`ENOENT: no such file or directory, open '${filename}'`);
    }

    return info;
  };
}

export function png(width = 600, height = 800): ImageInfo {
  return { mimeType: "image/png", width, height };
}

export function resource(
  id: string,
  imageId: string,
  overrides: Partial<Resource> = {},
): Resource {
  return {
    id,
    imageId,
    src: `${imageId}.png`,
    source: `/book/${imageId}.png`,
    mimeType: "image/png",
    width: 600,
    height: 800,
    cover: false,
    ...overrides,
  };
}

/** Trimmed lines of a pretty-printed document. */
export function lines(xml: string): string[] {
  return xml.split("\n").map((line) => line.trim());
}

export async function readArchive(filename: string): Promise<JSZip> {
  return JSZip.loadAsync(await readFile(filename));
}

export async function entryText(zip: JSZip, name: string): Promise<string> {
  const entry = zip.file(name);
  if (entry === null) {
    throw new Error(`archive has no entry '${name}'`);
  }

  return entry.async("string");
}

/** File entries in archive order. */
export function entryNames(zip: JSZip): string[] {
  return Object.values(zip.files)
    .filter(({ dir }) => !dir)
    .map(({ name }) => name);
}
