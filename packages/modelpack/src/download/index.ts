export { download, classifyHttpStatus, STREAM_BUFFER_SIZE } from './downloader.js';
export { ProgressReporter, describeProgress, formatMegabytes } from './progress.js';
export type {
  DownloadOptions,
  DownloadProgress,
  DownloadResult,
  FetchLike,
  ProgressCallback,
} from './types.js';
