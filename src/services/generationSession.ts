import { normalize } from "./similarity";

/**
 * Normalized texts already handed out by one session. Only ever grows.
 * Not synchronized: concurrent calls sharing a ledger can both accept texts
 * that turn out to duplicate each other.
 */
export class DedupLedger {
  private readonly seen = new Set<string>();

  has(text: string): boolean {
    return this.seen.has(normalize(text));
  }

  /** @returns the normalized form that was recorded */
  add(text: string): string {
    const norm = normalize(text);
    this.seen.add(norm);
    return norm;
  }

  get size(): number {
    return this.seen.size;
  }

  values(): string[] {
    return [...this.seen];
  }
}

/** Per exam-authoring state threaded through single-question generation. */
export type GenerationSession = {
  readonly ledger: DedupLedger;
  /** last auto-assigned question number */
  questionCounter: number;
};

export function createGenerationSession(): GenerationSession {
  return { ledger: new DedupLedger(), questionCounter: 0 };
}

/** Next auto-assigned question number (1, 2, 3, ...). */
export function nextQuestionNumber(session: GenerationSession): number {
  session.questionCounter += 1;
  return session.questionCounter;
}
