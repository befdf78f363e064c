export const CONFIDENCE_LEVELS = ["high", "medium", "low"] as const;

export type Confidence = (typeof CONFIDENCE_LEVELS)[number];

/** The four fields the model is asked to produce, after validation. */
export interface InterpretedAnswer {
  answer: string;
  confidence: Confidence;
  relevant_quotes: string[];
  not_found: boolean;
}

export interface Answer extends InterpretedAnswer {
  document_title: string;
  question: string;
  model_used: string;
  processing_time_ms: number;
}

export interface AskInput {
  title: string;
  content: string;
  question: string;
}
