import { describe, expect, it } from "vitest";
import { FALLBACK_QUESTIONS, fallbackExam, pickFallbackQuestion } from "./fallbacks";
import { DedupLedger } from "./generationSession";

describe("pickFallbackQuestion", () => {
  it("picks the first canned question not yet in the ledger and records it", () => {
    const ledger = new DedupLedger();
    ledger.add(FALLBACK_QUESTIONS[0].question_text.toUpperCase());

    const picked = pickFallbackQuestion(ledger, 9);

    expect(picked).toEqual(FALLBACK_QUESTIONS[1]);
    expect(ledger.has(FALLBACK_QUESTIONS[1].question_text)).toBe(true);
    expect(ledger.size).toBe(2);
  });

  it("synthesizes a numbered placeholder once the bank is used up", () => {
    const ledger = new DedupLedger();
    for (const q of FALLBACK_QUESTIONS) ledger.add(q.question_text);

    expect(pickFallbackQuestion(ledger, 12)).toEqual({
      question_text: "Generic CS question #12.",
      context: "This is a fallback question.",
      rubric: "Grading criteria: complete answer - 100 points.",
    });
    expect(ledger.has("generic cs question #12.")).toBe(true);
  });

  it("suffixes the placeholder until it is new to the ledger", () => {
    const ledger = new DedupLedger();
    for (const q of FALLBACK_QUESTIONS) ledger.add(q.question_text);
    ledger.add("Generic CS question #7.");
    ledger.add("Generic CS question #7-2.");

    expect(pickFallbackQuestion(ledger, 7).question_text).toBe("Generic CS question #7-3.");
    expect(ledger.size).toBe(6);
  });
});

describe("fallbackExam", () => {
  it("cycles the three templates and numbers sequentially", () => {
    const exam = fallbackExam("Compilers", 5);

    expect(exam.questions.map((q) => q.question_number)).toEqual([1, 2, 3, 4, 5]);
    expect(exam.questions[1].question_text).toBe(
      "Compare and contrast different approaches or methods within Compilers. When would you use each?"
    );
    expect(exam.questions[4].question_text).toBe(exam.questions[1].question_text);
    expect(exam.questions[2].context).toBe("This question tests practical understanding of Compilers.");
  });

  it("is deterministic for the same topic and count", () => {
    expect(fallbackExam("Compilers", 4)).toEqual(fallbackExam("Compilers", 4));
  });
});
