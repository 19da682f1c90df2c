export const SUPPORTED_ACTIONS = [
  "extract_document",
  "answer_question",
  "summarize",
  "generate_quiz",
  "grade_answer",
] as const;

export type Action = (typeof SUPPORTED_ACTIONS)[number];

export type AIAction = Exclude<Action, "extract_document">;

/** Validated input for one AI action; document text is already truncated. */
export type AIRequest =
  | { action: "answer_question"; documentText: string; question: string }
  | { action: "summarize"; documentText: string }
  | { action: "generate_quiz"; documentText: string }
  | {
      action: "grade_answer";
      question: string;
      userAnswer: string;
      correctAnswer: string;
    };

export interface PromptMessage {
  role: "system" | "user";
  content: string;
}

export interface Prompt {
  messages: PromptMessage[];
  maxTokens: number;
}

export type FailureStatus = 400 | 500;

export type EnvelopeStatus = 200 | FailureStatus;

export interface ResponseEnvelope {
  readonly success: boolean;
  readonly action: string;
  readonly response: string | null;
  readonly error: string | null;
  readonly status_code: EnvelopeStatus;
}

export interface QuizQuestionMap {
  [questionId: string]: string;
}

export function isAction(value: string): value is Action {
  return SUPPORTED_ACTIONS.some((action) => action === value);
}
