import OpenAI from "openai";
import { AppConfig } from "../config";
import { Logger } from "../observability";
import { ExtractionService } from "./extractionService";
import { OpenAiExtractionService, createOpenAiCompletion } from "./openaiExtractionService";
import { extractPdfText } from "./pdfText";

/** Builds the extraction handle once per run; it is passed down, never stored globally. */
export function createExtractionService(config: AppConfig, logger: Logger): ExtractionService {
  if (!config.openaiApiKey) {
    throw new Error("OPENAI_API_KEY is not set; live extraction needs it (use --dry-run to preview)");
  }

  const client = new OpenAI({
    apiKey: config.openaiApiKey,
    timeout: config.extractTimeoutMs,
    maxRetries: 0,
  });

  return new OpenAiExtractionService({
    complete: createOpenAiCompletion(client),
    documentText: extractPdfText,
    model: config.extractionModel,
    timeoutMs: config.extractTimeoutMs,
    logger,
  });
}
