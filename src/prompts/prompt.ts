import fs from "node:fs";
import path from "node:path";

export const TEMPLATE_DIR = path.join(__dirname, "templates");

export const QUESTION_TEMPLATE = "question_gen_v1.txt";
export const EXAM_TEMPLATE = "exam_gen_v1.txt";

export type PromptPair = { userPrompt: string; systemPrompt: string };

const DEFAULT_QUESTION_TEMPLATE = `Generate an essay-style exam question for a computer science course.

Topic: {topic}
Difficulty: {difficulty}
Question Number: {question_number}

Requirements:
1. Each question you generate must be unique for the exam. Do not repeat previous questions.
2. Provide relevant background context
3. Provide a detailed grading rubric

Important: Respond only in JSON format exactly like this:
{
    "question_text": "The question text",
    "context": "Background context and information",
    "rubric": "Detailed grading rubric with criteria"
}
Do not add anything else outside the JSON object.`;

const DEFAULT_EXAM_TEMPLATE = `Generate {num_questions} exam questions for topic: {topic}

{additional_details_section}

{guidance_section}

Respond in JSON format with a "questions" array containing {num_questions} question objects.
Each question should have: question_number, question_text, context, and rubric.`;

const cache = new Map<string, string>();

/** Reads a template file, or returns `fallback` (with a warning) when it is missing. */
export function loadPromptTemplate(name: string, fallback: string, dir = TEMPLATE_DIR): string {
  const file = path.join(dir, name);
  const hit = cache.get(file);
  if (hit !== undefined) return hit;

  try {
    const text = fs.readFileSync(file, "utf8");
    cache.set(file, text);
    return text;
  } catch (e) {
    const code = e instanceof Error && "code" in e ? e.code : undefined;
    if (code !== "ENOENT") throw e;
    console.warn(`[PROMPT] ${name} not found in ${dir}, using built-in default`);
    return fallback;
  }
}

/** Fills `{key}` placeholders for the given keys; any other braces stay as written. */
export function formatPrompt(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{([a-z_][a-z0-9_]*)\}/gi, (whole, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? String(values[key]) : whole
  );
}

export type QuestionPromptInput = {
  topic: string;
  difficulty: string;
  questionNumber: number;
};

export function questionPrompt({ topic, difficulty, questionNumber }: QuestionPromptInput, dir?: string): PromptPair {
  const template = loadPromptTemplate(QUESTION_TEMPLATE, DEFAULT_QUESTION_TEMPLATE, dir);
  const userPrompt = formatPrompt(template, { topic, difficulty, question_number: questionNumber });

  const systemPrompt = `You are an expert computer science professor generating exam questions.

Topic: ${topic}
Difficulty: ${difficulty}
Question Number: ${questionNumber}

Rules:
- Generate a NEW and UNIQUE question for each question number.
- Do NOT repeat previous questions.
- Respond with VALID JSON ONLY.
- Do NOT include explanations or extra text.

Required JSON format:
{
  "question_text": "string",
  "context": "string",
  "rubric": "string"
}`;

  return { userPrompt, systemPrompt };
}

export type ExamPromptInput = {
  topic: string;
  numQuestions: number;
  additionalDetails?: string;
};

export function examPrompt({ topic, numQuestions, additionalDetails = "" }: ExamPromptInput, dir?: string): PromptPair {
  const details = additionalDetails.trim();

  const additionalDetailsSection = details ? `Additional Details:\n${details}` : "";
  const guidanceSection = details
    ? `Use the additional details provided above to tailor the questions. Consider:
- Any specific sub-topics mentioned
- Grading criteria and expectations
- Specific questions or concepts the instructor wants included
- Expected answer elements
- Any other guidance provided`
    : "Since no additional details were provided, create well-rounded questions that cover the topic comprehensively. Make reasonable assumptions about appropriate difficulty level and scope.";

  const template = loadPromptTemplate(EXAM_TEMPLATE, DEFAULT_EXAM_TEMPLATE, dir);
  const userPrompt = formatPrompt(template, {
    topic,
    num_questions: numQuestions,
    additional_details_section: additionalDetailsSection,
    guidance_section: guidanceSection,
  });

  const systemPrompt = `You are an expert computer science professor creating a comprehensive oral exam.

Topic: ${topic}
Number of Questions: ${numQuestions}
${details ? `Additional Details: ${details}\n` : ""}
### Rules:
- Generate exactly ${numQuestions} unique questions, numbered 1 to ${numQuestions}.
- Each question must test a DIFFERENT and DISTINCT aspect of the topic.
- NO two questions may cover the same sub-concept or ask about the same thing.
- NO two questions may be rewordings of each other.
- Questions should suit an oral examination and encourage discussion.
- Provide a detailed rubric for each question.
- Respond with VALID JSON ONLY. No code fences. No text outside the JSON object.

### JSON to produce:
{
  "questions": [
    {
      "question_number": 1,
      "question_text": "string",
      "context": "string",
      "rubric": "string"
    }
  ]
}`;

  return { userPrompt, systemPrompt };
}
