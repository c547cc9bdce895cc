/**
 * Pairwise similarity between canonical keys.
 *
 * nameSimilarity is the larger of two views of the same pair:
 * - token overlap: Jaccard index of the token sets ("bank of america" ~ "america bank of")
 * - edit similarity: 1 - levenshtein / longer length, on token-sorted strings
 *   ("acme widget" ~ "acme widgets")
 * Both are symmetric and in [0, 1], so the combined score is too.
 */
import { distance } from "fastest-levenshtein";
import { keyTokens } from "@/lib/normalizer";

export function tokenOverlap(a: string, b: string): number {
  const tokensA = new Set(keyTokens(a));
  const tokensB = new Set(keyTokens(b));
  if (tokensA.size === 0 && tokensB.size === 0) return 1;
  let shared = 0;
  for (const token of tokensA) {
    if (tokensB.has(token)) shared++;
  }
  return shared / (tokensA.size + tokensB.size - shared);
}

export function sortedTokens(key: string): string {
  return keyTokens(key).sort().join(" ");
}

export function editSimilarity(a: string, b: string): number {
  const left = sortedTokens(a);
  const right = sortedTokens(b);
  const longest = Math.max(left.length, right.length);
  if (longest === 0) return 1;
  return 1 - distance(left, right) / longest;
}

export function nameSimilarity(a: string, b: string): number {
  return Math.max(tokenOverlap(a, b), editSimilarity(a, b));
}
