import { CORPUS_CONFIG } from "./config.js";
import { completePrompt, type ChatOptions } from "./openrouter.js";

export function splitIntoChunks(
  text: string,
  chunkWords: number = CORPUS_CONFIG.sentenceChunkWords,
): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  const chunks: string[] = [];
  for (let i = 0; i < words.length; i += chunkWords) {
    chunks.push(words.slice(i, i + chunkWords).join(" "));
  }
  return chunks;
}

/** Reads `1.` through `10.` numbered lines out of a model reply. */
export function parseNumberedList(reply: string): string[] {
  const sentences: string[] = [];
  for (const line of reply.split("\n")) {
    const match = /^\s*(\d+)\.(.*)$/.exec(line);
    if (!match) continue;
    const n = Number(match[1]);
    if (n < 1 || n > 10) continue;
    sentences.push((match[2] ?? "").trim());
  }
  return sentences;
}

export function buildSentencePrompt(query: string, chunks: string[], topK: number): string {
  return (
    "You are an expert at finding relevant text in documents. " +
    `The user is searching for: '${query}'. ` +
    `Find and extract up to ${topK} of the most relevant sentences from the text below. ` +
    "CRITICAL: You must copy the sentences EXACTLY as they appear in the text - do not paraphrase, summarize, or modify them in any way. " +
    "Return only the exact sentences as they are written, numbered 1., 2., etc.\n\n" +
    "Text:\n---\n" +
    chunks.join("\n\n") +
    "\n---"
  );
}

/** Asks the chat model to quote the sentences most relevant to a query. */
export class SentenceExtractor {
  constructor(private readonly options: ChatOptions) {}

  async extract(
    query: string,
    chunks: string[],
    topK: number = CORPUS_CONFIG.sentencesPerDocument,
  ): Promise<string[]> {
    if (chunks.length === 0) {
      throw new Error("Text chunks cannot be empty");
    }
    const reply = await completePrompt(buildSentencePrompt(query, chunks, topK), this.options);
    return parseNumberedList(reply).filter(Boolean);
  }
}
