export * from "./document";
export * from "./errors";
export { ArchiveData, ArchiveEntry, ArchiveOptions, commitArchive } from "./archive";
export { IdAllocator, generateIdentifier } from "./identifier";
export { ImageInfo, ImageProbe, SUPPORTED_IMAGE_TYPES, probeImage } from "./image";
export {
  DEFAULT_RENDITION,
  groupCollections,
  normalizeMetadata,
  normalizeRendition,
  parseDescription,
  primaryCreator,
  primaryTitle,
} from "./metadata";
export {
  ManifestItem,
  Package,
  PackageBuilder,
  SpineItem,
  TocEntry,
  buildPackage,
} from "./package";
export {
  PROJECT_FILE,
  compactDescription,
  findProject,
  readDescription,
  scaffoldBook,
  writeDescription,
} from "./project";
export { Resource, ResolvedChapter, locateCover, resolvePages } from "./resolve";
export { BookInput } from "./schema";
export {
  BuildOptions,
  defaultOutputName,
  loadPackage,
  resolveOutputPath,
  writeEpub,
  writePackage,
} from "./write";
export { EpubWriter } from "./writer";
