import { Hono } from "hono";
import { AIController } from "./controllers/aiController.js";
import { type ActionRouter, createActionRouter } from "./services/actionRouter.js";
import { groqCompletionClient } from "./groqClient.js";
import config from "./config/env.js";

export interface ApiDependencies {
  router: ActionRouter;
  hasApiKey?: boolean;
}

export function createApi(
  deps: ApiDependencies = {
    router: createActionRouter(),
    hasApiKey: groqCompletionClient.hasApiKey,
  }
): Hono {
  const api = new Hono();
  const aiController = new AIController(deps.router);

  // Health check endpoint
  api.get("/health", (c) =>
    c.json({
      ok: true,
      uptime: process.uptime(),
      model: config.groqModel,
      hasApiKey: !!deps.hasApiKey,
    })
  );

  // Study actions (extract_document, answer_question, summarize, generate_quiz, grade_answer)
  api.post("/ai", (c) => aiController.handleAction(c));

  // Quiz segmentation for answer checking
  api.post("/quiz/parse", (c) => aiController.parseQuiz(c));

  return api;
}
