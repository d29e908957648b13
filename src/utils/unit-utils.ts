/**
 * Normalizers for the magnitude strings nvidia-smi prints
 * ("1024 MiB", "250.00 W", "37 %", "45 C").
 *
 * None of these throw: anything that does not match the expected shape
 * normalizes to 0 so one bad field never fails a whole record.
 */

const MEMORY_MULTIPLIERS: Record<string, number> = {
  B: 1,
  KiB: 1024,
  MiB: 1024 * 1024,
  GiB: 1024 * 1024 * 1024,
};

function toUnsigned(value: number): number {
  return Number.isFinite(value) && value > 0 ? Math.round(value) : 0;
}

/**
 * Parse a memory value to bytes
 * Example: "1024 MiB" → 1073741824
 */
export function parseMemoryValue(value: string): number {
  const match = value.trim().match(/^(\d+(?:\.\d+)?)\s*(B|KiB|MiB|GiB)$/);
  if (!match) return 0;

  return toUnsigned(parseFloat(match[1]) * MEMORY_MULTIPLIERS[match[2]]);
}

/**
 * Parse a power value to milliwatts
 * Example: "250.00 W" → 250000, "N/A" → 0, "75" → 75000 (bare numbers are watts)
 */
export function parsePowerValue(value: string): number {
  const trimmed = value.trim();
  if (trimmed === '' || trimmed === 'N/A') return 0;

  const match = trimmed.match(/^(\d+(?:\.\d+)?)(?:\s*W)?$/);
  if (!match) return 0;

  return toUnsigned(parseFloat(match[1]) * 1000);
}

/**
 * Parse a percentage, clamped to 0-100
 * Example: "37 %" → 37
 */
export function parsePercentValue(value: string): number {
  const match = value.trim().match(/^(\d+(?:\.\d+)?)\s*%$/);
  if (!match) return 0;

  const percent = parseFloat(match[1]);
  return Number.isFinite(percent) ? Math.min(percent, 100) : 0;
}

/**
 * Parse a whole-degree temperature
 * Example: "45 C" → 45
 */
export function parseTemperatureValue(value: string): number {
  const match = value.trim().match(/^(\d+)\s*C$/);
  return match ? parseInt(match[1], 10) : 0;
}

/**
 * Parse a decimal process id, 0 when unparseable
 */
export function parsePid(value: string): number {
  const trimmed = value.trim();
  return /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : 0;
}
