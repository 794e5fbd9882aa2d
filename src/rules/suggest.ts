/**
 * "Did you mean" suggestions for anchors and rule ids.
 */

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (!a.length) return b.length;
  if (!b.length) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (current[j - 1] ?? 0) + 1,
        (previous[j] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

/**
 * Closest candidate within a distance of max(2, a third of the target).
 * A candidate ending with "-<target>" (a dropped numeric prefix) always qualifies.
 */
export function suggestClosest(target: string, candidates: Iterable<string>): string | null {
  const lowered = target.toLowerCase();
  const limit = Math.max(2, Math.floor(target.length / 3));
  let best: { candidate: string; distance: number } | null = null;

  for (const candidate of candidates) {
    if (candidate === lowered) return candidate;
    if (candidate.endsWith(`-${lowered}`) && /^[\d-]+$/.test(candidate.slice(0, -lowered.length - 1))) {
      return candidate;
    }
    const distance = levenshtein(lowered, candidate);
    if (distance <= limit && (!best || distance < best.distance)) {
      best = { candidate, distance };
    }
  }

  return best?.candidate ?? null;
}
