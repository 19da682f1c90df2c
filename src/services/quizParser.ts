import type { QuizQuestionMap } from "../types/actions.js";

/**
 * Segments quiz text into numbered question blocks for answer checking.
 *
 * The quiz prompt asks for `Q1.` .. `Q3.` headings, but the model does not
 * always comply. Parsing is best-effort: anything that does not follow the
 * expected numbering is folded into the current block, and text with no
 * recognizable first question yields an empty map.
 */
export class QuizParser {
  parse(quizText: string): QuizQuestionMap {
    const questions: QuizQuestionMap = {};
    if (typeof quizText !== "string") return questions;

    let questionNumber = 1;
    let current = "";

    for (const line of this.splitSegments(quizText)) {
      const expected = current ? questionNumber + 1 : questionNumber;

      if (this.startsQuestion(line, expected)) {
        if (current) {
          questions[`Q${questionNumber}`] = current;
          questionNumber = expected;
        }
        current = line;
      } else if (current) {
        current += " " + line;
      }
    }

    if (current) {
      questions[`Q${questionNumber}`] = current;
    }

    return questions;
  }

  /**
   * Non-empty trimmed lines, with a further break before each inline `Q<n>.`
   * so text collapsed onto one line still separates into questions
   */
  private splitSegments(text: string): string[] {
    return text
      .split(/\r?\n/)
      .flatMap((line) => line.split(/\s+(?=Q\d+[.)]\s)/))
      .map((segment) => segment.trim())
      .filter(Boolean);
  }

  private startsQuestion(line: string, questionNumber: number): boolean {
    return (
      line.startsWith(`${questionNumber}.`) ||
      line.startsWith(`${questionNumber} `) ||
      new RegExp(`^Q${questionNumber}[.)]`, "i").test(line)
    );
  }
}

export const quizParser = new QuizParser();
