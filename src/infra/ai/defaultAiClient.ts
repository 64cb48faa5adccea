import { AnswerMode, AppConfig, EmbeddingProvider } from "../../config/env.js";
import { OpenAiClient } from "./openAiClient.js";
import { OllamaClient } from "./ollamaClient.js";
import { AiClient, GroundingContext } from "./types.js";

export class DefaultAiClient implements AiClient {
  private readonly openAi: OpenAiClient;

  private readonly ollama: OllamaClient;

  private readonly embeddingProvider: EmbeddingProvider;

  private readonly answerMode: AnswerMode;

  constructor(config: AppConfig) {
    this.openAi = new OpenAiClient({
      apiKey: config.openaiApiKey,
      baseUrl: config.openaiBaseUrl,
      embeddingModel: config.openaiEmbeddingModel,
      chatModel: config.openaiChatModel,
      embeddingTimeoutMs: config.embeddingTimeoutMs,
      chatTimeoutMs: config.llmTimeoutMs,
    });
    this.ollama = new OllamaClient({
      baseUrl: config.ollamaBaseUrl,
      chatModel: config.ollamaChatModel,
      embeddingModel: config.ollamaEmbeddingModel,
      embeddingTimeoutMs: config.embeddingTimeoutMs,
      chatTimeoutMs: config.llmTimeoutMs,
    });
    this.embeddingProvider = config.embeddingProvider;
    this.answerMode = config.answerMode;
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    if (this.embeddingProvider === "openai") {
      return this.openAi.embedTexts(texts);
    }
    return this.ollama.embedTexts(texts);
  }

  async embedQuery(query: string): Promise<number[]> {
    if (this.embeddingProvider === "openai") {
      return this.openAi.embedQuery(query);
    }
    return this.ollama.embedQuery(query);
  }

  getAnswerMode(): AnswerMode {
    return this.answerMode;
  }

  async generateGroundedAnswer(
    question: string,
    contexts: GroundingContext[],
  ): Promise<string | null> {
    if (this.answerMode === "openai") {
      return this.openAi.generateGroundedAnswer(question, contexts);
    }
    if (this.answerMode === "ollama") {
      return this.ollama.generateGroundedAnswer(question, contexts);
    }
    return null;
  }
}
