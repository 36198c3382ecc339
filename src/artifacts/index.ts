// Barrel-файл модуля артефактов.
export type { ModelArtifact, ArtifactStoreOptions } from './store.js';
export type { DownloadProgressReporter, ProgressOutput } from './progress.js';

export { ArtifactStore, describeArtifact, expandHome } from './store.js';
export { ConsoleDownloadProgress, ProgressTracker } from './progress.js';
export { unpackArchive, isExtractableEntry } from './archive.js';
