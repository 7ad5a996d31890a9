import { z } from "zod";

// ---- contracts the model output must satisfy
export const GeneratedQuestionSchema = z.object({
  question_text: z.string(),
  context: z.string(),
  rubric: z.string(),
});

export const GeneratedQuestionWithNumberSchema = GeneratedQuestionSchema.extend({
  question_number: z.number().int().positive(),
});

export const GeneratedExamSchema = z.object({
  questions: z.array(GeneratedQuestionWithNumberSchema),
});

export type GeneratedQuestion = Readonly<z.infer<typeof GeneratedQuestionSchema>>;
export type GeneratedQuestionWithNumber = Readonly<z.infer<typeof GeneratedQuestionWithNumberSchema>>;
export type GeneratedExam = { readonly questions: readonly GeneratedQuestionWithNumber[] };

// ---- request bodies for the HTTP surface
export const GenerateQuestionRequestSchema = z.object({
  topic: z.string().trim().min(1).optional(),
  difficulty: z.string().trim().min(1).optional(),
  question_number: z.coerce.number().int().positive().optional(),
  session_id: z.string().trim().min(1).max(128).optional(),
});

export const GenerateExamRequestSchema = z.object({
  topic: z.string().trim().min(2, "topic is required"),
  num_questions: z.coerce.number().int().min(1).max(50),
  additional_details: z.string().max(5000).default(""),
});

export type GenerateQuestionRequest = z.infer<typeof GenerateQuestionRequestSchema>;
export type GenerateExamRequest = z.infer<typeof GenerateExamRequestSchema>;
