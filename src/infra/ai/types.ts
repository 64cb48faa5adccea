import { AnswerMode } from "../../config/env.js";

export interface GroundingContext {
  source: string;
  title: string;
  snippet: string;
}

export interface Embedder {
  embedTexts(texts: string[]): Promise<number[][]>;
  embedQuery(query: string): Promise<number[]>;
}

export interface AnswerGenerator {
  getAnswerMode(): AnswerMode;
  generateGroundedAnswer(
    question: string,
    contexts: GroundingContext[],
  ): Promise<string | null>;
}

export interface AiClient extends Embedder, AnswerGenerator {}
