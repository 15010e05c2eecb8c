import type { TagSuffixPolicy } from "../types/config.js";
import { ConfigError } from "../types/errors.js";

export const DEFAULT_SUFFIX_POLICY: TagSuffixPolicy = { format: "03d", prefix: "-" };

/**
 * Integer format spec: `d`, `<width>d` (space-padded) or `0<width>d`
 * (zero-padded).
 */
export function formatSuffixNumber(n: number, format: string): string {
  const match = /^(0?)(\d*)d$/.exec(format);
  if (!match) throw new ConfigError(`Unsupported tag suffix format '${format}'`);
  const width = match[2] ? Number.parseInt(match[2], 10) : 0;
  return String(n).padStart(width, match[1] === "0" ? "0" : " ");
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

type SuffixedTag = { tag: string; n: number };

function highestSuffixed(base: string, existingTags: readonly string[], prefix: string): SuffixedTag | null {
  const pattern = new RegExp(`^${escapeRegExp(base + prefix)}\\s*(\\d+)$`);
  let best: SuffixedTag | null = null;
  for (const tag of existingTags) {
    const match = pattern.exec(tag);
    if (!match) continue;
    const n = Number.parseInt(match[1], 10);
    if (!best || n > best.n) best = { tag, n };
  }
  return best;
}

/** Highest number N among tags shaped `<base><prefix>N`, 0 when there is none. */
export function lastSuffixNumber(base: string, existingTags: readonly string[], prefix: string): number {
  return highestSuffixed(base, existingTags, prefix)?.n ?? 0;
}

/** `v1.0` with `v1.0-001` and `v1.0-002` present gives `v1.0-003`. */
export function nextProgressiveTag(
  base: string,
  existingTags: readonly string[],
  policy: TagSuffixPolicy = DEFAULT_SUFFIX_POLICY,
): string {
  const next = lastSuffixNumber(base, existingTags, policy.prefix) + 1;
  return base + policy.prefix + formatSuffixNumber(next, policy.format);
}

/** Most recent progressive tag already created for `base`, or null. */
export function latestProgressiveTag(
  base: string,
  existingTags: readonly string[],
  policy: TagSuffixPolicy = DEFAULT_SUFFIX_POLICY,
): string | null {
  return highestSuffixed(base, existingTags, policy.prefix)?.tag ?? null;
}
