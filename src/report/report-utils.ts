import type { CountMap } from "../aggregate/types.js";
import type { RankedEntry } from "./types.js";

const THOUSANDS = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

export function formatNumber(value: number): string {
  if (value >= 1_000_000_000) {
    return `${(value / 1_000_000_000).toFixed(1)}B`;
  }
  if (value >= 1_000_000) {
    return `${(value / 1_000_000).toFixed(1)}M`;
  }
  return THOUSANDS.format(value);
}

export function formatCount(value: number): string {
  return THOUSANDS.format(value);
}

export function formatFiles(count: number): string {
  return `${count} file${count === 1 ? "" : "s"}`;
}

export function formatPercentage(value: number): string {
  return `${value.toFixed(1)}%`;
}

/** Largest token count first; equal counts fall back to name order. */
export function rankEntries(
  tokens: CountMap,
  files: CountMap,
): RankedEntry[] {
  return Object.entries(tokens)
    .map(([name, count]) => ({ name, tokens: count, files: files[name] ?? 0 }))
    .sort((a, b) => {
      if (a.tokens !== b.tokens) {
        return b.tokens - a.tokens;
      }
      if (a.name < b.name) {
        return -1;
      }
      return a.name > b.name ? 1 : 0;
    });
}
