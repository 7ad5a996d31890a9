import type {
  GeneratedExam,
  GeneratedQuestion,
  GeneratedQuestionWithNumber,
} from "../schemas/generationSchemas";
import type { DedupLedger } from "./generationSession";

export const FALLBACK_QUESTIONS: readonly GeneratedQuestion[] = [
  {
    question_text:
      "Explain the fundamental principles of data structures. Discuss the differences between arrays and linked lists, and when you would use each.",
    context:
      "Data structures are fundamental to computer science. Arrays store elements in contiguous memory, while linked lists use nodes with pointers.",
    rubric:
      "Grading criteria: (1) Understanding of arrays - 25 points, (2) Understanding of linked lists - 25 points, (3) Comparison - 25 points, (4) Use cases - 25 points.",
  },
  {
    question_text:
      "Describe the concept of algorithm time complexity (Big O notation). Provide examples of O(1), O(n), and O(n²) algorithms.",
    context:
      "Algorithm complexity analysis helps developers understand how algorithms scale. Big O notation describes worst-case time complexity.",
    rubric:
      "Grading criteria: (1) Explanation of Big O - 30 points, (2) O(1) example - 20 points, (3) O(n) example - 20 points, (4) O(n²) example - 20 points, (5) Importance - 10 points.",
  },
  {
    question_text:
      "Explain the concept of recursion in programming. Discuss its advantages and disadvantages, and provide an example.",
    context:
      "Recursion is a programming technique where a function calls itself. It's used in tree traversal and divide-and-conquer algorithms.",
    rubric:
      "Grading criteria: (1) Explanation - 25 points, (2) Advantages - 20 points, (3) Disadvantages - 20 points, (4) Example - 30 points, (5) Clarity - 5 points.",
  },
];

/** `variant` > 1 suffixes the number ("#4-2") so a reused question number still gets a fresh text. */
export function genericFallbackQuestion(questionNumber: number, variant = 1): GeneratedQuestion {
  const label = variant > 1 ? `${questionNumber}-${variant}` : `${questionNumber}`;
  return {
    question_text: `Generic CS question #${label}.`,
    context: "This is a fallback question.",
    rubric: "Grading criteria: complete answer - 100 points.",
  };
}

function unusedGenericQuestion(ledger: DedupLedger, questionNumber: number): GeneratedQuestion {
  let variant = 1;
  let q = genericFallbackQuestion(questionNumber, variant);
  while (ledger.has(q.question_text)) q = genericFallbackQuestion(questionNumber, ++variant);
  return q;
}

/**
 * First canned question the ledger has not seen, else a placeholder numbered
 * after the question. The pick is never already in the ledger, and is recorded there.
 */
export function pickFallbackQuestion(ledger: DedupLedger, questionNumber: number): GeneratedQuestion {
  const canned = FALLBACK_QUESTIONS.find((q) => !ledger.has(q.question_text));
  const picked = Object.freeze({ ...(canned ?? unusedGenericQuestion(ledger, questionNumber)) });
  ledger.add(picked.question_text);
  return picked;
}

type ExamTemplate = (topic: string) => GeneratedQuestion;

const FALLBACK_EXAM_TEMPLATES: readonly ExamTemplate[] = [
  (topic) => ({
    question_text: `Explain the fundamental concepts related to ${topic}. Provide examples and discuss their importance.`,
    context: `This question tests understanding of core concepts in ${topic}.`,
    rubric: "Grading: Understanding of concepts (40 points), Examples (30 points), Discussion of importance (30 points).",
  }),
  (topic) => ({
    question_text: `Compare and contrast different approaches or methods within ${topic}. When would you use each?`,
    context: `This question evaluates the ability to analyze different approaches in ${topic}.`,
    rubric: "Grading: Comparison (40 points), Contrast (30 points), Use cases (30 points).",
  }),
  (topic) => ({
    question_text: `Describe a real-world application of ${topic}. Explain how it works and why it's effective.`,
    context: `This question tests practical understanding of ${topic}.`,
    rubric: "Grading: Application description (40 points), Explanation (30 points), Effectiveness (30 points).",
  }),
];

/** Deterministic exam of `numQuestions` questions cycling the templates, numbered 1..N. */
export function fallbackExam(topic: string, numQuestions: number): GeneratedExam {
  const questions: GeneratedQuestionWithNumber[] = [];
  for (let i = 0; i < numQuestions; i++) {
    const template = FALLBACK_EXAM_TEMPLATES[i % FALLBACK_EXAM_TEMPLATES.length];
    questions.push(Object.freeze({ question_number: i + 1, ...template(topic) }));
  }
  return Object.freeze({ questions: Object.freeze(questions) });
}
