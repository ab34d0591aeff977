import type { TextMatch } from "../types/compliance.js";

export const DEFAULT_CONTEXT_RADIUS = 50;
export const SECONDARY_CONTEXT_RADIUS = 30;
export const DEFAULT_SECTION = "main_content";

export type MatchPattern = string | RegExp;

export interface MatchOptions {
  radius?: number;
  source?: string;
  /** Treat a string pattern as a literal phrase rather than a regex source. */
  literal?: boolean;
}

/**
 * Every non-overlapping, case-insensitive occurrence of `pattern` in `text`,
 * with the start offset and a window of surrounding text for review.
 */
export function findMatches(text: string, pattern: MatchPattern, options: MatchOptions = {}): TextMatch[] {
  if (!text) return [];
  const radius = options.radius ?? DEFAULT_CONTEXT_RADIUS;
  const regex = toGlobalRegex(pattern, options.literal ?? false);
  const matches: TextMatch[] = [];

  for (const hit of text.matchAll(regex)) {
    const offset = hit.index ?? 0;
    const matched = hit[0];
    matches.push({
      text: matched,
      offset,
      context: contextWindow(text, offset, offset + matched.length, radius),
      ...(options.source ? { source: options.source } : {})
    });
  }
  return matches;
}

export function firstMatch(text: string, pattern: MatchPattern, options: MatchOptions = {}): TextMatch | null {
  return findMatches(text, pattern, options)[0] ?? null;
}

export function containsMatch(text: string, pattern: MatchPattern, literal = false): boolean {
  if (!text) return false;
  return toRegex(pattern, literal, "i").test(text);
}

/**
 * Name of the first labeled section whose text contains `pattern`, or `fallback`.
 */
export function locateSection(
  pattern: MatchPattern,
  sections: Record<string, string>,
  fallback: string = DEFAULT_SECTION
): string {
  for (const [name, content] of Object.entries(sections)) {
    if (containsMatch(content, pattern)) return name;
  }
  return fallback;
}

export function contextWindow(text: string, start: number, end: number, radius: number): string {
  const from = Math.max(0, start - radius);
  const to = Math.min(text.length, end + radius);
  return `...${text.slice(from, to).trim()}...`;
}

export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function toGlobalRegex(pattern: MatchPattern, literal: boolean): RegExp {
  // matchAll needs the g flag; a zero-width match is advanced past by matchAll itself.
  return toRegex(pattern, literal, "gi");
}

function toRegex(pattern: MatchPattern, literal: boolean, flags: string): RegExp {
  if (pattern instanceof RegExp) {
    const merged = new Set([...pattern.flags.replace(/[gy]/g, ""), ...flags]);
    return new RegExp(pattern.source, Array.from(merged).join(""));
  }
  return new RegExp(literal ? escapeRegex(pattern) : pattern, flags);
}
