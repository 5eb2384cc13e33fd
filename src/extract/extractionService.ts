import { MonitoringCriteria } from "../types";

export interface ExtractionRequest {
  targetId: string;
  locator: string;
  document: Buffer;
  criteria: MonitoringCriteria;
}

/**
 * Turns one result document into CSV text with the result-column
 * header. Implementations throw on any service failure; the orchestrator
 * converts that into a failed attempt.
 */
export interface ExtractionService {
  extract(request: ExtractionRequest): Promise<string>;
}
