import type { Outcome } from "../types.js";

export interface Summarizer {
  readonly name: string;
  /** Returns `text` unchanged when it already fits in `maxLength`. */
  summarize(text: string, maxLength: number): Promise<string>;
}

export interface SummaryStrategy {
  readonly name: string;
  attempt(text: string, maxLength: number): Promise<Outcome<string>>;
}
