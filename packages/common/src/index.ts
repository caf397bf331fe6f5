/**
 * @bucketferry/common - Shared utilities for bucketferry packages
 */

export {
  SIZE_UNITS,
  type SizeUnit,
  isSizeUnit,
  parseSize,
  formatSize,
  percentOf,
} from './size-utils.js';
