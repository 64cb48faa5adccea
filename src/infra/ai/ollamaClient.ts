import { SYSTEM_PROMPT, buildUserPrompt } from "./prompt.js";
import { GroundingContext } from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
  embeddingTimeoutMs: number;
  chatTimeoutMs: number;
}

interface OllamaEmbeddingsResponse {
  embedding?: number[];
}

interface OllamaChatResponse {
  message?: {
    content?: string;
  };
}

export class OllamaClient {
  constructor(private readonly options: OllamaClientOptions) {}

  /** Ollama embeds one prompt per call; batching and concurrency belong to the caller. */
  async embedTexts(texts: string[]): Promise<number[][]> {
    const embeddings: number[][] = [];
    for (const text of texts) {
      embeddings.push(await this.embedQuery(text));
    }
    return embeddings;
  }

  async embedQuery(query: string): Promise<number[]> {
    const response = await fetch(`${this.options.baseUrl}/api/embeddings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.embeddingModel,
        prompt: query,
      }),
      signal: AbortSignal.timeout(this.options.embeddingTimeoutMs),
    });

    if (!response.ok) {
      throw new Error(
        `Ollama embeddings failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = (await response.json()) as OllamaEmbeddingsResponse;
    if (!data.embedding || data.embedding.length === 0) {
      throw new Error("Ollama embeddings returned empty vector.");
    }
    return data.embedding;
  }

  async generateGroundedAnswer(
    question: string,
    contexts: GroundingContext[],
  ): Promise<string | null> {
    const response = await fetch(`${this.options.baseUrl}/api/chat`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.chatModel,
        stream: false,
        keep_alive: "30m",
        options: {
          temperature: 0.1,
          top_p: 0.9,
        },
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: buildUserPrompt(question, contexts) },
        ],
      }),
      signal: AbortSignal.timeout(this.options.chatTimeoutMs),
    });

    if (!response.ok) {
      throw new Error(
        `Ollama chat failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = (await response.json()) as OllamaChatResponse;
    return data.message?.content?.trim() || null;
  }
}
