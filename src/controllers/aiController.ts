import type { Context } from "hono";
import type { ActionRouter } from "../services/actionRouter.js";
import { buildErrorEnvelope } from "../services/responseEnvelope.js";
import { quizParser } from "../services/quizParser.js";

export class AIController {
  constructor(private readonly router: ActionRouter) {}

  /**
   * Run one study action; the envelope's status code becomes the HTTP status
   */
  async handleAction(c: Context) {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (error) {
      console.warn("[ROUTER] Rejected request with invalid JSON body:", error);
      return c.json(
        buildErrorEnvelope("", "Request body must be valid JSON", 400),
        400
      );
    }

    const envelope = await this.router.handle(body);
    return c.json(envelope, envelope.status_code);
  }

  /**
   * Split quiz text into numbered questions for answer checking
   */
  async parseQuiz(c: Context) {
    try {
      const body = await c.req.json();
      const text: unknown = body?.text;

      if (typeof text !== "string") {
        return c.json({ error: "text must be a string" }, 400);
      }

      return c.json({ questions: quizParser.parse(text) });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return c.json({ error: message }, 400);
    }
  }
}
