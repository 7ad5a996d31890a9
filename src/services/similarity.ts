// near-duplicate detection for generated question text

/** Pairs scoring above this are treated as the same question within a batch. */
export const BATCH_SIMILARITY_THRESHOLD = 0.7;

/** Weight applied to the subset-style overlap ratio. */
export const OVERLAP_WEIGHT = 0.8;

export function normalize(text: string): string {
  return String(text).toLowerCase().replace(/\s+/g, " ").trim();
}

const words = (s: string) => new Set(s.split(" ").filter(Boolean));

/**
 * Word-set similarity of two normalized strings in [0, 1]:
 * max(jaccard, 0.8 * |A∩B| / min(|A|, |B|)). The overlap term catches a question
 * whose wording is mostly contained in a longer one.
 */
export function similarity(a: string, b: string): number {
  const wa = words(a);
  const wb = words(b);
  if (wa.size === 0 || wb.size === 0) return 0;

  let intersection = 0;
  for (const w of wa) if (wb.has(w)) intersection++;
  const union = wa.size + wb.size - intersection;

  const jaccard = intersection / union;
  const overlap = intersection / Math.min(wa.size, wb.size);
  return Math.max(jaccard, OVERLAP_WEIGHT * overlap);
}

export type DuplicatePair = {
  /** 1-based position of the earlier question */
  first: number;
  /** 1-based position of the later question */
  second: number;
  score: number;
  exact: boolean;
};

/**
 * Compares each text, in input order, against every distinct normalized text
 * seen before it. A pair is flagged on an exact match or a score above the
 * threshold.
 */
export function findDuplicatePairs(
  texts: readonly string[],
  threshold = BATCH_SIMILARITY_THRESHOLD
): DuplicatePair[] {
  const seen: { norm: string; position: number }[] = [];
  const pairs: DuplicatePair[] = [];

  texts.forEach((text, i) => {
    const norm = normalize(text);
    const exactHit = seen.find((s) => s.norm === norm);
    if (exactHit) {
      pairs.push({ first: exactHit.position, second: i + 1, score: 1, exact: true });
      return;
    }
    for (const s of seen) {
      const score = similarity(norm, s.norm);
      if (score > threshold) pairs.push({ first: s.position, second: i + 1, score, exact: false });
    }
    seen.push({ norm, position: i + 1 });
  });

  return pairs;
}
