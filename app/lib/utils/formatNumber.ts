import type { SatellitePosition } from "../model/types";

const SUFFIXES: Array<[threshold: number, suffix: string]> = [
  [1e12, "T"],
  [1e9, "B"],
  [1e6, "M"],
  [1e3, "k"],
];

/**
 * Format to at most maxSigFigs significant figures with k/M/B/T suffixes,
 * never in scientific notation
 */
export function formatSigFigs(value: number, maxSigFigs: number = 4): string {
  if (value === 0 || !Number.isFinite(value)) return "0";

  const sigFigs = Math.max(1, maxSigFigs);
  const sign = value < 0 ? "-" : "";
  const absValue = Math.abs(value);

  for (const [threshold, suffix] of SUFFIXES) {
    if (absValue >= threshold) {
      return sign + withSigFigs(absValue / threshold, sigFigs) + suffix;
    }
  }
  if (absValue < 0.0001) {
    return value.toFixed(4);
  }
  return sign + withSigFigs(absValue, sigFigs);
}

function withSigFigs(value: number, sigFigs: number): string {
  let formatted = value.toPrecision(sigFigs);

  // toPrecision switches to exponent form when sigFigs < integer digits
  if (formatted.includes("e")) {
    const num = parseFloat(formatted);
    const decimals = Math.max(0, sigFigs - Math.floor(Math.log10(num)) - 1);
    formatted = num.toFixed(Math.min(decimals, 4));
  }

  return formatted.includes(".") ? formatted.replace(/\.?0+$/, "") : formatted;
}

export function formatDecimal(value: number, decimals: number = 1): string {
  return value.toFixed(decimals);
}

export function formatPosition(position: SatellitePosition, decimals: number = 1): string {
  return `(${formatDecimal(position.x, decimals)}, ${formatDecimal(position.y, decimals)}, ${formatDecimal(position.z, decimals)})`;
}
