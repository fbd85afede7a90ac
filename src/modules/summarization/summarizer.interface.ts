export const SUMMARIZER = Symbol('SUMMARIZER');

export interface SummaryRequest {
  transcript: string;
  instruction: string;
}

export interface GeneratedSummary {
  summary: string;
  model: string;
  tokensUsed: number;
}

/** Produces summary text for a transcript, steered by an instruction. */
export interface Summarizer {
  summarize(request: SummaryRequest, signal?: AbortSignal): Promise<GeneratedSummary>;
}
