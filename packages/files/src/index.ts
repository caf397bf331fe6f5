/**
 * File utilities module - filesystem operations used by bucketferry
 */

export {
  fileExists,
  getFileStats,
  getFileSize,
  ensureDirectory,
  ensureDirectoryResolvingConflicts,
  ensureWritableDirectory,
  type DirectoryConflict,
} from './operations.js';
