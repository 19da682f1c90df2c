import test from "node:test";
import assert from "node:assert/strict";
import { PromptBuilder, TOKEN_BUDGETS } from "../../src/services/promptBuilder.js";

const builder = new PromptBuilder();

test("Prompt Builder - Answer Question Template", () => {
  const prompt = builder.build({
    action: "answer_question",
    documentText: "Mitochondria produce ATP.",
    question: "What produces ATP?",
  });

  assert.equal(prompt.maxTokens, 300);
  assert.deepEqual(prompt.messages, [
    {
      role: "user",
      content:
        "Answer this question based on the text below.\n" +
        "Text: Mitochondria produce ATP.\n" +
        "Question: What produces ATP?\n" +
        "Provide a concise and accurate answer.",
    },
  ]);
});

test("Prompt Builder - Summarize Template", () => {
  const prompt = builder.build({ action: "summarize", documentText: "Cells divide." });

  assert.equal(prompt.maxTokens, 400);
  assert.equal(
    prompt.messages[0].content,
    "Create a well-structured bullet point summary of this text:\nCells divide.\nFocus on key concepts and main ideas."
  );
});

test("Prompt Builder - Quiz Template Format", () => {
  const prompt = builder.build({ action: "generate_quiz", documentText: "Enzymes speed reactions." });
  const lines = prompt.messages[0].content.split("\n");

  assert.equal(prompt.maxTokens, 600);
  assert.equal(lines[0], "Create exactly 3 multiple-choice questions about this text:");
  assert.equal(lines[1], "Enzymes speed reactions.");
  assert.equal(lines[3], "Format each question EXACTLY like this:");
  assert.deepEqual(lines.slice(4, 10), [
    "Q1. [Question text]",
    "A) [Option A]",
    "B) [Option B]",
    "C) [Option C]",
    "D) [Option D]",
    "",
  ]);
  assert.equal(lines[10], "Q2. [Question text]");
  assert.equal(lines[16], "Q3. [Question text]");
  assert.equal(
    lines[lines.length - 1],
    "Ensure each question starts with Q1., Q2., Q3. and options use A), B), C), D) format."
  );
});

test("Prompt Builder - Grade Answer Template", () => {
  const prompt = builder.build({
    action: "grade_answer",
    question: "Which organelle makes ATP?",
    userAnswer: "B",
    correctAnswer: "C",
  });
  const content = prompt.messages[0].content;

  assert.equal(prompt.maxTokens, 300);
  assert.ok(content.includes("\nQuestion: Which organelle makes ATP?\n"));
  assert.ok(content.includes("\nUser's Answer: B\nExpected Correct Answer: C\n"));
  assert.ok(content.includes("1. First states whether the user's answer matches the expected answer"));
  assert.ok(content.includes("4. Is encouraging and helpful for learning"));
});

test("Prompt Builder - Deterministic Single User Message", () => {
  const request = { action: "summarize", documentText: "Same input" } as const;
  const first = builder.build(request);
  const second = builder.build(request);

  assert.deepEqual(first, second);
  assert.equal(first.messages.length, 1);
  assert.equal(first.messages[0].role, "user");
});

test("Prompt Builder - Token Budgets", () => {
  assert.deepEqual(TOKEN_BUDGETS, {
    answer_question: 300,
    summarize: 400,
    generate_quiz: 600,
    grade_answer: 300,
  });
});
