import { readLlmConfig, reloadEnvFile } from "./src/config/llm";
reloadEnvFile();

import { QuestionGenerator } from "./src/services/questionGenerator";
import { errorMessage } from "./src/utils/errors";

// usage: npm run diagnose -- "Data Structures" 8
const topic = process.argv[2] || "Data Structures";
const count = Number(process.argv[3] ?? 8);

const preview = (s: string, n: number) => (s.length > n ? `${s.slice(0, n)}...` : s);

async function diagnose() {
  const line = "=".repeat(60);
  console.log(`\n${line}\nExam generation diagnostic\n${line}`);

  try {
    const cfg = readLlmConfig();
    console.log(`Model: ${cfg.model}`);
    console.log(`Base URL: ${cfg.baseURL ?? "(provider default)"}`);
    console.log(`Temperature: ${cfg.temperature ?? "(provider default)"}`);
    console.log(`Max tokens: ${cfg.maxTokens ?? "(provider default)"}`);
  } catch (e) {
    console.error("❌ Configuration error:", errorMessage(e));
    process.exitCode = 1;
    return;
  }
  console.log(line);

  const generator = new QuestionGenerator();
  const started = Date.now();
  const exam = await generator.generateExam({ topic, numQuestions: count });

  console.log(`\n✅ ${exam.questions.length} questions in ${Date.now() - started} ms\n`);
  for (const q of exam.questions) {
    console.log(`Question ${q.question_number}:`);
    console.log(`  Text: ${preview(q.question_text, 100)}`);
    console.log(`  Context: ${preview(q.context, 80)}`);
    console.log(`  Rubric: ${preview(q.rubric, 80)}\n`);
  }
}

diagnose().catch((e: unknown) => {
  console.error("❌ Exam generation failed:", e);
  process.exitCode = 1;
});
