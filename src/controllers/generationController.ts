import type { RequestHandler } from "express";
import {
  GenerateExamRequestSchema,
  GenerateQuestionRequestSchema,
} from "../schemas/generationSchemas";
import { createGenerationSession, type GenerationSession } from "../services/generationSession";
import type { QuestionGenerator } from "../services/questionGenerator";
import { LlmConfigError } from "../utils/errors";

export type GenerationHandlers = {
  generateQuestion: RequestHandler;
  generateExam: RequestHandler;
  deleteSession: RequestHandler;
};

export type GenerationControllerOptions = {
  /** most sessions kept; past it the least recently used is dropped */
  maxSessions?: number;
};

export const DEFAULT_MAX_SESSIONS = 1000;

export function createGenerationController(
  generator: QuestionGenerator,
  opts: GenerationControllerOptions = {}
): GenerationHandlers {
  const maxSessions = Math.max(1, opts.maxSessions ?? DEFAULT_MAX_SESSIONS);
  // in-memory LRU; Map iteration order is insertion order, so the first key is the stalest
  const sessions = new Map<string, GenerationSession>();

  function sessionFor(id: string | undefined): GenerationSession {
    if (!id) return generator.defaultSession;
    const s = sessions.get(id) ?? createGenerationSession();
    sessions.delete(id);
    sessions.set(id, s);
    for (const stale of sessions.keys()) {
      if (sessions.size <= maxSessions) break;
      sessions.delete(stale);
    }
    return s;
  }

  /** POST /generation/question -> GeneratedQuestion */
  const generateQuestion: RequestHandler = async (req, res, next) => {
    try {
      const body = GenerateQuestionRequestSchema.parse(req.body ?? {});
      const question = await generator.generateQuestion(
        { topic: body.topic, difficulty: body.difficulty, questionNumber: body.question_number },
        sessionFor(body.session_id)
      );
      return res.json(question);
    } catch (err) {
      if (err instanceof LlmConfigError) {
        console.error("generateQuestion config error:", err.message);
        return res.status(err.status).json({ error: "Question generation is not configured" });
      }
      return next(err);
    }
  };

  /** POST /generation/exam -> GeneratedExam */
  const generateExam: RequestHandler = async (req, res, next) => {
    try {
      const body = GenerateExamRequestSchema.parse(req.body ?? {});
      const exam = await generator.generateExam({
        topic: body.topic,
        numQuestions: body.num_questions,
        additionalDetails: body.additional_details,
      });
      return res.json(exam);
    } catch (err) {
      if (err instanceof LlmConfigError) {
        console.error("generateExam config error:", err.message);
        return res.status(err.status).json({ error: "Question generation is not configured" });
      }
      return next(err);
    }
  };

  /** DELETE /generation/sessions/:id */
  const deleteSession: RequestHandler = (req, res) => {
    sessions.delete(req.params.id);
    res.status(204).end();
  };

  return { generateQuestion, generateExam, deleteSession };
}
