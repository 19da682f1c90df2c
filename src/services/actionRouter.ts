import {
  SUPPORTED_ACTIONS,
  isAction,
  type Action,
  type AIAction,
  type AIRequest,
  type ResponseEnvelope,
} from "../types/actions.js";
import {
  EmptyInputError,
  ExtractionError,
  InvalidActionError,
  MissingFieldError,
  StudyAidError,
  describeError,
} from "../utils/errors.js";
import { buildErrorEnvelope, buildSuccessEnvelope } from "./responseEnvelope.js";
import { PromptBuilder, promptBuilder } from "./promptBuilder.js";
import { ModelInvoker } from "./modelInvoker.js";
import { ResponseCleaner, responseCleaner } from "./responseCleaner.js";
import { type DocumentExtractor, extractionService } from "./extractionService.js";
import { groqCompletionClient } from "../groqClient.js";
import config from "../config/env.js";

type RequestBody = Record<string, unknown>;

export interface ActionRouterDependencies {
  invoker: ModelInvoker;
  extractor: DocumentExtractor;
  promptBuilder?: PromptBuilder;
  cleaner?: ResponseCleaner;
  documentCharLimit?: number;
}

const GRADE_FIELDS = ["question", "user_answer", "correct_answer"] as const;

function isRecord(value: unknown): value is RequestBody {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Accepts the request mapping itself or a gateway proxy event whose `body`
 * is the JSON-encoded request
 */
function parseRequestBody(rawRequest: unknown): RequestBody {
  const candidate: unknown =
    isRecord(rawRequest) && typeof rawRequest.body === "string"
      ? JSON.parse(rawRequest.body)
      : rawRequest;

  if (!isRecord(candidate)) {
    throw new Error("Request must be a JSON object");
  }
  return candidate;
}

function readField(body: RequestBody, key: string): string {
  const value = body[key];
  return typeof value === "string" ? value : "";
}

/** First `limit` characters, counted in code points */
export function truncateText(text: string, limit: number): string {
  if (text.length <= limit) return text;
  return Array.from(text).slice(0, limit).join("");
}

/**
 * Validates an incoming action and payload, makes the one external call the
 * action needs, and always answers with a response envelope.
 */
export class ActionRouter {
  private readonly invoker: ModelInvoker;
  private readonly extractor: DocumentExtractor;
  private readonly promptBuilder: PromptBuilder;
  private readonly cleaner: ResponseCleaner;
  private readonly documentCharLimit: number;

  constructor(deps: ActionRouterDependencies) {
    this.invoker = deps.invoker;
    this.extractor = deps.extractor;
    this.promptBuilder = deps.promptBuilder ?? promptBuilder;
    this.cleaner = deps.cleaner ?? responseCleaner;
    this.documentCharLimit = deps.documentCharLimit ?? config.documentCharLimit;
  }

  async handle(rawRequest: unknown): Promise<ResponseEnvelope> {
    let actionName = "";
    try {
      const body = parseRequestBody(rawRequest);
      actionName = readField(body, "action").trim().toLowerCase();
      const action = this.parseAction(actionName);

      const response =
        action === "extract_document"
          ? await this.extractDocument(body)
          : await this.runAIAction(action, body);

      return buildSuccessEnvelope(action, response);
    } catch (error) {
      if (error instanceof StudyAidError) {
        const log = error.statusCode === 400 ? console.warn : console.error;
        log(`[ROUTER] ${error.name} for action "${actionName}": ${error.message}`);
        return buildErrorEnvelope(actionName, error.message, error.statusCode);
      }

      console.error("[ROUTER] Error processing request:", error);
      return buildErrorEnvelope(
        actionName,
        `Internal server error: ${describeError(error)}`,
        500
      );
    }
  }

  private parseAction(actionName: string): Action {
    if (!isAction(actionName)) {
      throw new InvalidActionError(actionName, SUPPORTED_ACTIONS);
    }
    return actionName;
  }

  private async extractDocument(body: RequestBody): Promise<string> {
    const encoded = readField(body, "encoded_document");
    if (!encoded.trim()) {
      throw new EmptyInputError("No document data provided");
    }

    let text: string;
    try {
      text = await this.extractor.extract(encoded);
    } catch (error) {
      throw new ExtractionError(
        `Document processing failed: ${describeError(error)}`,
        { cause: error }
      );
    }

    const trimmed = text.trim();
    if (!trimmed) {
      throw new ExtractionError(
        "Document processing failed: No extractable text found in document"
      );
    }
    return trimmed;
  }

  private async runAIAction(action: AIAction, body: RequestBody): Promise<string> {
    const request = this.validateAIRequest(action, body);
    const prompt = this.promptBuilder.build(request);
    const raw = await this.invoker.invoke(prompt.messages, prompt.maxTokens);
    return this.cleaner.clean(raw);
  }

  private validateAIRequest(action: AIAction, body: RequestBody): AIRequest {
    if (action === "grade_answer") {
      const missing = GRADE_FIELDS.filter((field) => !readField(body, field).trim());
      if (missing.length) {
        throw new MissingFieldError(
          `Missing required fields for grade_answer: ${missing.join(", ")}`,
          missing
        );
      }
      return {
        action,
        question: readField(body, "question"),
        userAnswer: readField(body, "user_answer"),
        correctAnswer: readField(body, "correct_answer"),
      };
    }

    const documentText = truncateText(
      readField(body, "document_text"),
      this.documentCharLimit
    );
    if (!documentText.trim()) {
      throw new EmptyInputError("No text content provided");
    }

    if (action === "answer_question") {
      const question = readField(body, "question");
      if (!question.trim()) {
        throw new MissingFieldError("No question provided", ["question"]);
      }
      return { action, documentText, question };
    }

    return { action, documentText };
  }
}

export function createActionRouter(): ActionRouter {
  return new ActionRouter({
    invoker: new ModelInvoker(groqCompletionClient),
    extractor: extractionService,
  });
}
