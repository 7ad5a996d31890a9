import { examPrompt, questionPrompt } from "../prompts/prompt";
import {
  GeneratedExamSchema,
  GeneratedQuestionSchema,
  type GeneratedExam,
  type GeneratedQuestion,
} from "../schemas/generationSchemas";
import { logBadGen } from "../doc/logBadGen";
import { LlmConfigError, errorMessage } from "../utils/errors";
import { accepted, fatal, retry, runAttempts, type AttemptOutcome } from "./attempts";
import { fallbackExam, pickFallbackQuestion } from "./fallbacks";
import {
  createGenerationSession,
  nextQuestionNumber,
  type GenerationSession,
} from "./generationSession";
import { ModelGateway, type JsonCompleter } from "./modelGateway";
import { BATCH_SIMILARITY_THRESHOLD, findDuplicatePairs } from "./similarity";
import { validateResponse } from "./validateResponse";

export const MAX_GENERATION_ATTEMPTS = 5;

export const DEFAULT_TOPIC = "Computer Science";
export const DEFAULT_DIFFICULTY = "Intermediate";

export type GenerateQuestionParams = {
  topic?: string;
  difficulty?: string;
  questionNumber?: number;
};

export type GenerateExamParams = {
  topic: string;
  numQuestions: number;
  additionalDetails?: string;
};

type GeneratorOptions = {
  gateway?: JsonCompleter;
  /** overrides the prompt template directory */
  templateDir?: string;
};

// the gateway's failures cost one attempt, except a missing/invalid configuration
function gatewayFailure(e: unknown): AttemptOutcome<never> {
  if (e instanceof LlmConfigError) return fatal(e);
  return retry(`gateway error: ${errorMessage(e)}`);
}

function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes > 0 && seconds > 0) return `${minutes} min ${seconds} sec`;
  if (minutes > 0) return `${minutes} min`;
  return `${seconds} sec`;
}

/**
 * Produces single questions and whole exams from the model. Both entry points
 * resolve to a usable result on every failure except a configuration error:
 * rejected attempts are retried and an exhausted budget falls back to canned
 * questions.
 */
export class QuestionGenerator {
  readonly defaultSession: GenerationSession = createGenerationSession();
  private readonly gateway: JsonCompleter;
  private readonly templateDir?: string;

  constructor(opts: GeneratorOptions = {}) {
    this.gateway = opts.gateway ?? new ModelGateway();
    this.templateDir = opts.templateDir;
  }

  /**
   * One question that the session has not handed out before. Without a
   * `questionNumber` the session's counter supplies the next one.
   */
  async generateQuestion(
    params: GenerateQuestionParams = {},
    session: GenerationSession = this.defaultSession
  ): Promise<GeneratedQuestion> {
    const topic = params.topic ?? DEFAULT_TOPIC;
    const difficulty = params.difficulty ?? DEFAULT_DIFFICULTY;
    const questionNumber = params.questionNumber ?? nextQuestionNumber(session);
    const { userPrompt, systemPrompt } = questionPrompt({ topic, difficulty, questionNumber }, this.templateDir);

    return runAttempts<GeneratedQuestion>({
      label: `question #${questionNumber}`,
      maxAttempts: MAX_GENERATION_ATTEMPTS,
      attempt: async () => {
        let raw: unknown;
        try {
          raw = await this.gateway.complete(userPrompt, systemPrompt);
        } catch (e) {
          return gatewayFailure(e);
        }

        const question = validateResponse(raw, GeneratedQuestionSchema, `question #${questionNumber}`);
        if (!question) return retry("response did not match the question contract");

        if (session.ledger.has(question.question_text)) {
          return retry(`duplicate of an earlier question in this session`);
        }

        session.ledger.add(question.question_text);
        return accepted(Object.freeze(question));
      },
      fallback: () => pickFallbackQuestion(session.ledger, questionNumber),
    });
  }

  /**
   * `numQuestions` questions numbered 1..N with no two near-duplicates. A batch
   * is accepted or rejected as a whole; exams are not checked against any
   * session ledger.
   *
   * Generation failures end in the fallback exam, never an error. A count that
   * is not a positive integer is a caller bug rejected up front.
   * @throws RangeError when `numQuestions` is not a positive integer
   * @throws LlmConfigError when generation is not configured
   */
  async generateExam({ topic, numQuestions, additionalDetails = "" }: GenerateExamParams): Promise<GeneratedExam> {
    if (!Number.isInteger(numQuestions) || numQuestions < 1) {
      throw new RangeError(`numQuestions must be a positive integer, got ${numQuestions}`);
    }

    const start = Date.now();
    console.info(`[EXAM] generating ${numQuestions} questions on "${topic}"`);
    const { userPrompt, systemPrompt } = examPrompt({ topic, numQuestions, additionalDetails }, this.templateDir);

    const exam = await runAttempts<GeneratedExam>({
      label: `exam "${topic}"`,
      maxAttempts: MAX_GENERATION_ATTEMPTS,
      attempt: async () => {
        let raw: unknown;
        try {
          raw = await this.gateway.complete(userPrompt, systemPrompt);
        } catch (e) {
          return gatewayFailure(e);
        }

        const parsed = validateResponse(raw, GeneratedExamSchema, `exam "${topic}"`);
        if (!parsed) return retry("response did not match the exam contract");

        const { questions } = parsed;
        if (questions.length !== numQuestions) {
          return retry(`expected ${numQuestions} questions, got ${questions.length}`);
        }

        const numbers = questions.map((q) => q.question_number).sort((a, b) => a - b);
        if (numbers.some((n, i) => n !== i + 1)) {
          logBadGen("batch-structure-rejected", { topic, reason: "numbering", numbers });
          return retry(`question numbers ${JSON.stringify(numbers)} are not 1..${numQuestions}`);
        }

        const pairs = findDuplicatePairs(
          questions.map((q) => q.question_text),
          BATCH_SIMILARITY_THRESHOLD
        );
        if (pairs.length > 0) {
          const desc = pairs
            .map((p) => (p.exact ? `Q${p.second} repeats Q${p.first}` : `Q${p.second}~Q${p.first} ${Math.round(p.score * 100)}%`))
            .join(", ");
          logBadGen("batch-structure-rejected", { topic, reason: "duplicates", pairs });
          return retry(`duplicate or similar questions: ${desc}`);
        }

        return accepted(Object.freeze({ questions: Object.freeze(questions.map((q) => Object.freeze(q))) }));
      },
      fallback: () => fallbackExam(topic, numQuestions),
    });

    console.info(`[EXAM] "${topic}" ready with ${exam.questions.length} questions in ${formatDuration(Date.now() - start)}`);
    return exam;
  }
}
