import { Ollama } from "ollama";
import type { GenerationSettings } from "./config";
import { GenerationError } from "./errors";
import type { RetrievalResult } from "./types";

/** Contract of the generative model: one prompt in, generated text out. */
export interface GenerationOracle {
  readonly modelName: string;
  generate(prompt: string): Promise<string>;
}

export interface ModelAvailability {
  reachable: boolean;
  installed: boolean;
  models: string[];
}

/**
 * Ollama-backed {@link GenerationOracle}. Every HTTP call is bounded by
 * `timeoutMs`; the client itself does not retry.
 */
export class OllamaGenerator implements GenerationOracle {
  private readonly client: Ollama;

  public constructor(private readonly settings: GenerationSettings) {
    const timeoutMs = settings.timeoutMs;
    const fetchWithTimeout: typeof fetch = (input, init) => {
      const timeout = AbortSignal.timeout(timeoutMs);
      const signal = init?.signal ? AbortSignal.any([init.signal, timeout]) : timeout;
      return fetch(input, { ...init, signal });
    };
    this.client = new Ollama({ host: settings.host, fetch: fetchWithTimeout });
  }

  public get modelName(): string {
    return this.settings.model;
  }

  public async generate(prompt: string): Promise<string> {
    const response = await this.client.generate({
      model: this.settings.model,
      prompt,
      stream: false,
      options: {
        num_predict: this.settings.maxTokens,
        temperature: this.settings.temperature,
        repeat_penalty: this.settings.repeatPenalty,
        num_ctx: this.settings.contextWindow,
      },
    });
    return response.response;
  }

  /**
   * Check the server is up and the configured model is installed. Never
   * pulls models; the caller decides what to tell the operator.
   */
  public async checkAvailability(): Promise<ModelAvailability> {
    try {
      const { models } = await this.client.list();
      const names = models.map((m) => m.name);
      const wanted = this.settings.model;
      const installed = names.some((n) => n === wanted || n === `${wanted}:latest`);
      return { reachable: true, installed, models: names };
    } catch (e) {
      console.error(`[RAG] Ollama not reachable at ${this.settings.host}:`, e instanceof Error ? e.message : e);
      return { reachable: false, installed: false, models: [] };
    }
  }
}

const INSTRUCTION =
  "You are a helpful assistant answering questions about a private document collection. " +
  "Answer using only the context below. If the context does not contain the answer, say so. " +
  "Cite sources by their bracketed number.";

/**
 * Assemble the single prompt sent to the model: instruction, numbered context
 * blocks with their source, then the question.
 */
export function buildPrompt(query: string, context: RetrievalResult): string {
  const blocks = context.length
    ? context.map((hit, i) => `[${i + 1}] (source: ${hit.path}#${hit.chunk})\n${hit.text}`).join("\n\n")
    : "(no relevant context found)";
  return `${INSTRUCTION}\n\nContext:\n${blocks}\n\nQuestion: ${query}\n\nAnswer:`;
}

/**
 * Turns a query plus its retrieval into an answer with exactly one oracle
 * call. No conversation state is kept here; callers fold prior turns into the
 * query text if they want them.
 */
export class GenerationOrchestrator {
  public constructor(private readonly oracle: GenerationOracle) {}

  /**
   * @returns The oracle output, unmodified.
   * @throws {GenerationError} when the oracle fails or times out; the error
   *         carries `context` so the caller can still show sources.
   */
  public async generate(query: string, context: RetrievalResult): Promise<string> {
    const prompt = buildPrompt(query, context);
    let text: unknown;
    try {
      text = await this.oracle.generate(prompt);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      console.error(`[RAG] Generation via ${this.oracle.modelName} failed: ${reason}`);
      throw new GenerationError(`Could not generate a response: ${reason}`, context, { cause: e });
    }
    if (typeof text !== "string") {
      throw new GenerationError("Could not generate a response: model returned no text", context);
    }
    return text;
  }
}
