export { EpubPackage } from './package.ts';
export type { EpubMetadata, ManifestItem, TocEntry } from './package.ts';
