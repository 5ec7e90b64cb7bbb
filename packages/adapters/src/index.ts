// ─── HTTP ─────────────────────────────────────────────────────────────────────
export { UndiciFileDownloader } from './http/undici-file-downloader.js';

// ─── Filesystem ───────────────────────────────────────────────────────────────
export { GzipDecompressor } from './fs/gzip-decompressor.js';

// ─── Child Process ────────────────────────────────────────────────────────────
export { ChildProcessToolRunner } from './process/child-process-tool-runner.js';
