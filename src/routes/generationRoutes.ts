import { Router } from "express";
import {
  createGenerationController,
  type GenerationControllerOptions,
} from "../controllers/generationController";
import type { QuestionGenerator } from "../services/questionGenerator";

export default function generationRoutes(
  generator: QuestionGenerator,
  opts: GenerationControllerOptions = {}
): Router {
  const router = Router();
  const ctrl = createGenerationController(generator, opts);

  router.post("/question", ctrl.generateQuestion);
  router.post("/exam", ctrl.generateExam);
  router.delete("/sessions/:id", ctrl.deleteSession);

  return router;
}
