import { CORPUS_CONFIG } from "./config.js";
import { ChatCompletionSchema } from "./schemas.js";

export interface ChatOptions {
  apiKey: string;
  model: string;
  timeoutMs?: number;
}

/**
 * Sends a single-turn prompt and returns the trimmed reply text. Throws on
 * transport errors, non-2xx responses and bodies that don't look like a chat
 * completion.
 */
export async function completePrompt(
  prompt: string,
  options: ChatOptions,
): Promise<string> {
  const res = await fetch(CORPUS_CONFIG.chatCompletionsUrl, {
    method: "POST",
    headers: {
      Authorization: `Bearer ${options.apiKey}`,
      "Content-Type": "application/json",
    },
    body: JSON.stringify({
      model: options.model,
      messages: [{ role: "user", content: prompt }],
    }),
    signal: AbortSignal.timeout(options.timeoutMs ?? CORPUS_CONFIG.requestTimeoutMs),
  });

  if (!res.ok) {
    const text = await res.text();
    throw new Error(`Chat API error (${res.status}): ${text}`);
  }

  const parsed = ChatCompletionSchema.safeParse(await res.json());
  if (!parsed.success) {
    throw new Error("Chat API returned an unexpected response shape");
  }

  const [choice] = parsed.data.choices;
  return (choice?.message.content ?? "").trim();
}
