import OpenAI from "openai";
import { ExtractionError } from "../core/errors";
import { Logger } from "../observability";
import { ExtractionRequest, ExtractionService } from "./extractionService";
import { ExtractionPrompt, buildPrompt } from "./prompt";

export interface CompletionRequest extends ExtractionPrompt {
  model: string;
}

/** The one chat-completion call the service needs; tests substitute it. */
export type CompletionFn = (request: CompletionRequest, signal: AbortSignal) => Promise<string | null>;

export function createOpenAiCompletion(client: OpenAI): CompletionFn {
  return async (request, signal) => {
    const response = await client.chat.completions.create(
      {
        model: request.model,
        temperature: 0,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.user },
        ],
      },
      { signal },
    );
    return response.choices[0]?.message.content ?? null;
  };
}

export interface OpenAiExtractionServiceOptions {
  complete: CompletionFn;
  documentText: (document: Buffer) => Promise<string>;
  model: string;
  timeoutMs: number;
  logger: Logger;
}

export class OpenAiExtractionService implements ExtractionService {
  private readonly options: OpenAiExtractionServiceOptions;

  constructor(options: OpenAiExtractionServiceOptions) {
    this.options = options;
  }

  async extract(request: ExtractionRequest): Promise<string> {
    const { complete, documentText, model, timeoutMs, logger } = this.options;
    const text = await documentText(request.document);
    const prompt = buildPrompt(request.criteria, text);

    logger.debug("extraction_request", {
      targetId: request.targetId,
      url: request.locator,
      model,
      promptChars: prompt.user.length,
    });

    const content = await complete({ ...prompt, model }, AbortSignal.timeout(timeoutMs));
    if (content === null || content.trim() === "") {
      throw new ExtractionError(`Model ${model} returned an empty response`);
    }
    return content;
  }
}
