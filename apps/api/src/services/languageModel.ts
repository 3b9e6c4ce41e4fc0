import OpenAI from "openai";
import { GenerationError } from "../infra/errors";

// ────────────────────────────────────────────
// Language model capability
//
// prompt + context in, text out. The only
// long-latency call a query makes.
// ────────────────────────────────────────────

export type ConversationTurn = {
  question: string;
  answer: string;
};

export type GenerateOptions = {
  signal?: AbortSignal;
  history?: readonly ConversationTurn[];
};

export type LanguageModel = {
  readonly name: string;
  /** Fails with GenerationError on quota, timeout or upstream errors. */
  generate(prompt: string, context: string, opts?: GenerateOptions): Promise<string>;
};

export const SYSTEM_PROMPT = [
  "You are a cloud cost analyst.",
  "Answer only from the cost records and optimization insights in the context.",
  "Quote amounts with their currency, name the services involved and keep the answer short.",
  "If the context does not contain the answer, say so.",
].join(" ");

type ChatMessage = { role: "system" | "user" | "assistant"; content: string };

export function buildMessages(prompt: string, context: string, history: readonly ConversationTurn[] = []): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: "system", content: SYSTEM_PROMPT }];
  for (const turn of history) {
    messages.push({ role: "user", content: turn.question });
    messages.push({ role: "assistant", content: turn.answer });
  }
  messages.push({ role: "user", content: `Context:\n${context}\n\nQuestion: ${prompt}` });
  return messages;
}

export type OpenAILanguageModelOptions = {
  client: OpenAI;
  model: string;
  temperature?: number;
  maxTokens?: number;
};

export class OpenAILanguageModel implements LanguageModel {
  readonly name: string;

  constructor(private readonly opts: OpenAILanguageModelOptions) {
    this.name = `openai:${opts.model}`;
  }

  async generate(prompt: string, context: string, opts: GenerateOptions = {}): Promise<string> {
    try {
      const res = await this.opts.client.chat.completions.create(
        {
          model: this.opts.model,
          temperature: this.opts.temperature ?? 0.2,
          max_tokens: this.opts.maxTokens ?? 600,
          messages: buildMessages(prompt, context, opts.history),
        },
        // the orchestrator owns timeouts and retries
        { signal: opts.signal, maxRetries: 0 },
      );
      const text = res.choices[0]?.message?.content?.trim();
      if (!text) throw new GenerationError("Language model returned an empty answer");
      return text;
    } catch (e: unknown) {
      throw toGenerationError(e);
    }
  }
}

export function toGenerationError(e: unknown): GenerationError {
  if (e instanceof GenerationError) return e;
  if (e instanceof OpenAI.RateLimitError) return new GenerationError(e.message, "quota", { cause: e });
  if (e instanceof OpenAI.APIConnectionTimeoutError || e instanceof OpenAI.APIUserAbortError) {
    return new GenerationError(e.message, "timeout", { cause: e });
  }
  const message = e instanceof Error ? e.message : String(e);
  return new GenerationError(`Language model call failed: ${message}`, "upstream", { cause: e });
}
