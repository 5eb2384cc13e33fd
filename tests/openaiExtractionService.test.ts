import { describe, expect, it } from "vitest";
import { ExtractionError } from "../src/core/errors";
import { buildPrompt } from "../src/extract";
import { CompletionFn, CompletionRequest, OpenAiExtractionService } from "../src/extract/openaiExtractionService";
import { HEADER, criteria, quietLogger } from "./helpers";

function service(complete: CompletionFn) {
  return new OpenAiExtractionService({
    complete,
    documentText: async (document) => `TEXT:${document.toString()}`,
    model: "test-model",
    timeoutMs: 1000,
    logger: quietLogger(),
  });
}

const request = {
  targetId: "T1",
  locator: "https://results.test/T1.pdf",
  document: Buffer.from("page one"),
  criteria,
};

describe("buildPrompt", () => {
  it("names the clubs, the athletes and the expected header", () => {
    const prompt = buildPrompt(criteria, "1. Jane Doe SC Alpina 1:02.34");
    const lines = prompt.user.split("\n");

    expect(lines).toContain("Clubs to extract: SC Alpina");
    expect(lines).toContain("- Jane Doe");
    expect(lines).toContain(`Format the output as CSV with exactly these headers: ${HEADER}`);
    expect(lines.slice(-2)).toEqual(["--- RESULT LIST ---", "1. Jane Doe SC Alpina 1:02.34"]);
  });

  it("omits the athlete section when only clubs are monitored", () => {
    const prompt = buildPrompt({ groups: ["SC Alpina"], names: [] }, "text");
    expect(prompt.user).not.toContain("Athletes to extract:");
  });
});

describe("OpenAiExtractionService", () => {
  it("sends the document text in the prompt and returns the raw answer", async () => {
    const seen: CompletionRequest[] = [];
    const answer = await service(async (completion) => {
      seen.push(completion);
      return `${HEADER}\n`;
    }).extract(request);

    expect(answer).toBe(`${HEADER}\n`);
    expect(seen).toHaveLength(1);
    expect(seen[0].model).toBe("test-model");
    expect(seen[0].user.endsWith("--- RESULT LIST ---\nTEXT:page one")).toBe(true);
  });

  it("fails on an empty answer", async () => {
    await expect(service(async () => null).extract(request)).rejects.toBeInstanceOf(ExtractionError);
    await expect(service(async () => "  \n").extract(request)).rejects.toThrow("Model test-model returned an empty response");
  });

  it("passes a signal that aborts after the timeout", async () => {
    let received: AbortSignal | undefined;
    await service(async (_completion, signal) => {
      received = signal;
      return HEADER;
    }).extract(request);

    expect(received).toBeInstanceOf(AbortSignal);
    expect(received?.aborted).toBe(false);
  });
});
