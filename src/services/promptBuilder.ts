import type { AIAction, AIRequest, Prompt } from "../types/actions.js";

/** Upper bound on generated tokens per action */
export const TOKEN_BUDGETS: Readonly<Record<AIAction, number>> = {
  answer_question: 300,
  summarize: 400,
  generate_quiz: 600,
  grade_answer: 300,
};

const QUIZ_QUESTION_COUNT = 3;
const QUIZ_OPTION_LETTERS = ["A", "B", "C", "D"] as const;

function quizLayout(): string[] {
  const lines: string[] = [];
  for (let n = 1; n <= QUIZ_QUESTION_COUNT; n++) {
    lines.push(`Q${n}. [Question text]`);
    for (const letter of QUIZ_OPTION_LETTERS) {
      lines.push(`${letter}) [Option ${letter}]`);
    }
    lines.push("");
  }
  return lines;
}

/**
 * Builds the single user message sent to the model for each AI action.
 * Inputs are embedded verbatim; the router truncates and validates first.
 */
export class PromptBuilder {
  build(request: AIRequest): Prompt {
    return {
      messages: [{ role: "user", content: this.content(request) }],
      maxTokens: TOKEN_BUDGETS[request.action],
    };
  }

  private content(request: AIRequest): string {
    switch (request.action) {
      case "answer_question":
        return [
          "Answer this question based on the text below.",
          `Text: ${request.documentText}`,
          `Question: ${request.question}`,
          "Provide a concise and accurate answer.",
        ].join("\n");

      case "summarize":
        return [
          "Create a well-structured bullet point summary of this text:",
          request.documentText,
          "Focus on key concepts and main ideas.",
        ].join("\n");

      case "generate_quiz": {
        const headings = Array.from(
          { length: QUIZ_QUESTION_COUNT },
          (_, i) => `Q${i + 1}.`
        ).join(", ");
        const options = QUIZ_OPTION_LETTERS.map((l) => `${l})`).join(", ");
        return [
          `Create exactly ${QUIZ_QUESTION_COUNT} multiple-choice questions about this text:`,
          request.documentText,
          "",
          "Format each question EXACTLY like this:",
          ...quizLayout(),
          `Ensure each question starts with ${headings} and options use ${options} format.`,
        ].join("\n");
      }

      case "grade_answer":
        return [
          "Please provide feedback on this quiz answer:",
          "",
          `Question: ${request.question}`,
          "",
          `User's Answer: ${request.userAnswer}`,
          `Expected Correct Answer: ${request.correctAnswer}`,
          "",
          "Provide constructive feedback that:",
          "1. First states whether the user's answer matches the expected answer",
          "2. Explains why the expected answer is correct",
          "3. Provides educational insights about the topic",
          "4. Is encouraging and helpful for learning",
          "Keep the feedback concise but informative.",
        ].join("\n");
    }
  }
}

export const promptBuilder = new PromptBuilder();
