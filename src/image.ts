import sharp from "sharp";

export interface ImageInfo {
  mimeType: string;
  width: number;
  height: number;
}

/** Reads the media type and pixel size of the image at `path`. */
export type ImageProbe = (path: string) => Promise<ImageInfo>;

/** Raster formats a reading system must support, keyed by media type, with the extension used inside the ePub. */
export const SUPPORTED_IMAGE_TYPES: Readonly<Record<string, string>> = {
  "image/png": ".png",
  "image/jpeg": ".jpg",
  "image/gif": ".gif",
  "image/webp": ".webp",
};

export function isSupportedImageType(mimeType: string): boolean {
  return Object.prototype.hasOwnProperty.call(SUPPORTED_IMAGE_TYPES, mimeType);
}

export function extensionFor(mimeType: string): string {
  if (!isSupportedImageType(mimeType)) {
    throw new Error(`no extension for unsupported media type '${mimeType}'`);
  }

  return SUPPORTED_IMAGE_TYPES[mimeType];
}

/** Probes the file header with sharp; the pixels themselves are never decoded. */
export const probeImage: ImageProbe = async (path) => {
  const { format, width, height } = await sharp(path).metadata();

  if (!format) {
    throw new Error("unrecognized image format");
  }
  if (!width || !height) {
    throw new Error("image has no dimensions");
  }

  return { mimeType: `image/${format}`, width, height };
};
