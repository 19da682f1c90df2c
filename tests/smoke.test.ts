import test from "node:test";
import assert from "node:assert/strict";
import { createApi } from "../src/routes.js";
import { ActionRouter } from "../src/services/actionRouter.js";
import { ModelInvoker, type CompletionClient } from "../src/services/modelInvoker.js";
import type { DocumentExtractor } from "../src/services/extractionService.js";

class CountingModel implements CompletionClient {
  calls = 0;

  async complete(): Promise<unknown> {
    this.calls++;
    return { choices: [{ message: { content: "<reasoning>draft</reasoning>osmosis moves water." } }] };
  }
}

const noExtraction: DocumentExtractor = {
  async extract() {
    throw new Error("extraction not expected");
  },
};

function buildApi() {
  const model = new CountingModel();
  const router = new ActionRouter({
    invoker: new ModelInvoker(model, { timeoutMs: 1000 }),
    extractor: noExtraction,
  });
  return { model, api: createApi({ router, hasApiKey: false }) };
}

// Helper to parse JSON response body
async function json(res: Response): Promise<unknown> {
  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch {
    return { __raw: text };
  }
}

function post(path: string, body: string): Request {
  return new Request(`http://local${path}`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body,
  });
}

test("GET /health reports model configuration", async () => {
  const { api } = buildApi();
  const res = await api.fetch(new Request("http://local/health"));
  assert.equal(res.status, 200);
  const body = await json(res);
  assert.ok(typeof body === "object" && body !== null && "ok" in body);
  assert.equal(body.ok, true);
});

test("POST /ai returns the cleaned completion envelope", async () => {
  const { api, model } = buildApi();
  const res = await api.fetch(
    post("/ai", JSON.stringify({ action: "summarize", document_text: "Osmosis notes" }))
  );

  assert.equal(res.status, 200);
  assert.deepEqual(await json(res), {
    success: true,
    action: "summarize",
    response: "Osmosis moves water.",
    error: null,
    status_code: 200,
  });
  assert.equal(model.calls, 1);
});

test("POST /ai mirrors validation failures as HTTP 400", async () => {
  const { api, model } = buildApi();
  const res = await api.fetch(post("/ai", JSON.stringify({ action: "grade_answer", question: "Q" })));

  assert.equal(res.status, 400);
  assert.deepEqual(await json(res), {
    success: false,
    action: "grade_answer",
    response: null,
    error: "Missing required fields for grade_answer: user_answer, correct_answer",
    status_code: 400,
  });
  assert.equal(model.calls, 0);
});

test("POST /ai with invalid JSON returns 400 envelope", async () => {
  const { api, model } = buildApi();
  const res = await api.fetch(post("/ai", "{oops"));

  assert.equal(res.status, 400);
  assert.deepEqual(await json(res), {
    success: false,
    action: "",
    response: null,
    error: "Request body must be valid JSON",
    status_code: 400,
  });
  assert.equal(model.calls, 0);
});

test("POST /ai extraction failure returns 500", async () => {
  const { api } = buildApi();
  const res = await api.fetch(
    post("/ai", JSON.stringify({ action: "extract_document", encoded_document: "SGk=" }))
  );

  assert.equal(res.status, 500);
  assert.deepEqual(await json(res), {
    success: false,
    action: "extract_document",
    response: null,
    error: "Document processing failed: extraction not expected",
    status_code: 500,
  });
});

test("POST /quiz/parse segments questions", async () => {
  const { api } = buildApi();
  const res = await api.fetch(
    post("/quiz/parse", JSON.stringify({ text: "1. First?\nA) x\n2. Second?\nA) y" }))
  );

  assert.equal(res.status, 200);
  assert.deepEqual(await json(res), {
    questions: { Q1: "1. First? A) x", Q2: "2. Second? A) y" },
  });
});

test("POST /quiz/parse rejects non-string text", async () => {
  const { api } = buildApi();
  const res = await api.fetch(post("/quiz/parse", JSON.stringify({ text: 42 })));

  assert.equal(res.status, 400);
  assert.deepEqual(await json(res), { error: "text must be a string" });
});
