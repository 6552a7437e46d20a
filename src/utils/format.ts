/**
 * Small formatting helpers shared by report output
 */

const BYTE_UNITS = ['bytes', 'KiB', 'MiB', 'GiB', 'TiB'] as const;

/**
 * Format a byte count with IEC units
 *
 * @example
 * formatBytes(512)      // '512 bytes'
 * formatBytes(1536)     // '1.5 KiB'
 * formatBytes(262144000) // '250.0 MiB'
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  for (const unit of BYTE_UNITS) {
    if (value < 1024 || unit === 'TiB') {
      return unit === 'bytes' ? `${value} bytes` : `${value.toFixed(1)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(1)} TiB`;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
