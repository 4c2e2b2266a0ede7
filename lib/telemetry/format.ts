export const ZERO_SPEED = '0 B/s';
export const ZERO_SIZE = '0 MB';
export const MEMORY_NOT_APPLICABLE = 'N/A';

const KIB = 1024;
const MIB = KIB * 1024;

function sanitize(bytes: number) {
  return Number.isFinite(bytes) && bytes > 0 ? bytes : 0;
}

/**
 * Bytes per second → `"12.3 KB/s"` below 1024 KB/s, `"1.5 MB/s"` above.
 */
export function formatSpeed(bytesPerSec: number) {
  const kb = sanitize(bytesPerSec) / KIB;
  if (kb < 1024) {
    return `${kb.toFixed(1)} KB/s`;
  }
  return `${(kb / 1024).toFixed(1)} MB/s`;
}

/**
 * Byte count → `"12.3 MB"` below 1024 MB, `"1.25 GB"` above.
 */
export function formatBytes(bytes: number) {
  const mb = sanitize(bytes) / MIB;
  if (mb < 1024) {
    return `${mb.toFixed(1)} MB`;
  }
  return `${(mb / 1024).toFixed(2)} GB`;
}
