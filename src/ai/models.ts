import OpenAI from "openai";
import { fail, ok, type Result } from "../pipeline/types.js";

export interface ClientOptions {
  apiKey?: string;
  /** Base URL of an OpenAI-compatible server, e.g. http://localhost:11434/v1 for Ollama */
  host?: string;
  timeoutMs?: number;
}

/**
 * Build an OpenAI client. Retries are disabled: a failed call is reported to
 * the caller as-is.
 */
export function createClient(opts: ClientOptions = {}): OpenAI {
  return new OpenAI({
    // Local OpenAI-compatible servers ignore the key, but the client insists on one
    apiKey: opts.apiKey || "unused",
    baseURL: opts.host || undefined,
    timeout: opts.timeoutMs,
    maxRetries: 0,
  });
}

/** Map anything thrown by the OpenAI client to a status + message pair. */
export function describeClientError(err: unknown): { status?: number; message: string } {
  if (err instanceof OpenAI.APIError && err.status !== undefined) {
    return { status: err.status, message: err.message };
  }
  if (err instanceof Error) return { message: err.message };
  return { message: String(err) };
}

/**
 * Capability the TextProcessor depends on: one single-turn prompt in, one
 * text out.
 */
export interface TextModel {
  readonly model: string;
  generate(prompt: string): Promise<Result<string>>;
  /** Resolve once the model is known to the host; reject otherwise. */
  verify(): Promise<void>;
}

export class OpenAITextModel implements TextModel {
  private client: OpenAI;

  constructor(readonly model: string, opts: ClientOptions = {}) {
    this.client = createClient(opts);
    console.log(`[ai] Text model ${model} on ${this.client.baseURL}`);
  }

  async verify(): Promise<void> {
    await this.client.models.retrieve(this.model);
  }

  async generate(prompt: string): Promise<Result<string>> {
    try {
      const resp = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: "user", content: prompt }],
      });
      const content = resp.choices[0]?.message?.content;
      if (typeof content !== "string") {
        return fail("processing_error", "Model response did not contain any text");
      }
      return ok(content);
    } catch (err) {
      const { status, message } = describeClientError(err);
      return fail("processing_error", message, { status });
    }
  }
}
