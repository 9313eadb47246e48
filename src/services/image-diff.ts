/**
 * Image-set diff by fingerprint
 */

export interface ImageSetDiff {
  /** Previous fingerprints absent from the new set */
  toDelete: string[];
  /** New fingerprints absent from the previous set */
  toAdd: string[];
  /** Previous fingerprints still present */
  retained: string[];
  /** retained ∪ toAdd, in submission order */
  final: string[];
}

function unique(values: readonly string[]): string[] {
  return Array.from(new Set(values));
}

export function diffImageSets(previous: readonly string[], next: readonly string[]): ImageSetDiff {
  const before = unique(previous);
  const after = unique(next);
  const beforeSet = new Set(before);
  const afterSet = new Set(after);

  return {
    toDelete: before.filter((hash) => !afterSet.has(hash)),
    toAdd: after.filter((hash) => !beforeSet.has(hash)),
    retained: before.filter((hash) => afterSet.has(hash)),
    final: after,
  };
}
