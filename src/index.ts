export { runBatch, processEntry } from "./memories/batch.js";
export type { BatchOptions, EntryContext } from "./memories/batch.js";
export {
  classifyEntry,
  entryBaseName,
  imageExtension,
  imageFormat,
  inspectBuffer,
  isArchivePath,
} from "./memories/classify.js";
export type { ImageFormat } from "./memories/classify.js";
export { pickPair, resolvePair } from "./memories/pairing.js";
export { listArchiveEntries, readArchiveMembers, withUnpacked } from "./memories/archive.js";
export { combineMedia } from "./memories/composite.js";
export { existsIn, snapshotExisting } from "./memories/existing.js";
export { copyEntry } from "./memories/copy.js";
export { parseBatchParams, BatchParamsSchema } from "./memories/params.js";
export { formatSummary } from "./memories/summary.js";
export { createFfmpegVideoCodec } from "./memories/video-codec.js";
export type { VideoCodec, OverlayVideoOptions } from "./memories/video-codec.js";
export * from "./memories/errors.js";
export type * from "./memories/types.js";
export { runCli } from "./cli/program.js";
