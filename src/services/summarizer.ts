import { AnswerMode } from "../config/env.js";
import { PipelineError, describeError } from "../domain/errors.js";
import { Answer, RetrievedContext } from "../domain/types.js";
import { AnswerGenerator, GroundingContext } from "../infra/ai/types.js";
import {
  DEFAULT_SNIPPET_MAX_CHARS,
  EMPTY_CONTEXT_SUMMARY,
  SOURCES_ONLY_SUMMARY,
  buildExtractiveDigest,
  buildGroundingContexts,
} from "../pipelines/answering.js";
import { DEFAULT_MAX_CITED_SOURCES, extractCitations } from "../pipelines/citations.js";
import { Logger, NullLogger } from "../utils/logger.js";

export interface SummarizerOptions {
  maxContextChars: number;
  maxSnippetChars?: number;
  maxCitedSources?: number;
}

export interface SummaryResult extends Answer {
  generationMode: AnswerMode;
  contextsUsed: number;
}

export class Summarizer {
  constructor(
    private readonly generator: AnswerGenerator,
    private readonly options: SummarizerOptions,
    private readonly logger: Logger = new NullLogger(),
  ) {}

  get answerMode(): AnswerMode {
    return this.generator.getAnswerMode();
  }

  async summarize(query: string, context: RetrievedContext): Promise<SummaryResult> {
    const generationMode = this.generator.getAnswerMode();
    const contexts = buildGroundingContexts(
      context,
      this.options.maxContextChars,
      this.options.maxSnippetChars ?? DEFAULT_SNIPPET_MAX_CHARS,
    );

    if (contexts.length === 0) {
      return { summary: EMPTY_CONTEXT_SUMMARY, citedSources: [], generationMode, contextsUsed: 0 };
    }

    const raw =
      generationMode === "extractive"
        ? buildExtractiveDigest(query, contexts)
        : await this.generate(query, contexts);

    const { body, citedSources } = extractCitations(raw, {
      numberedSources: contexts.map((item) => item.source),
      allowedSources: context.map((item) => item.chunk.sourceUrl),
      maxSources: this.options.maxCitedSources ?? DEFAULT_MAX_CITED_SOURCES,
    });

    if (citedSources.length === 0) {
      this.logger.warn("summary has no verifiable citation", { mode: generationMode });
    }
    if (!body) {
      this.logger.warn("answer held no text outside its source list", { mode: generationMode });
    }

    return {
      summary: body || SOURCES_ONLY_SUMMARY,
      citedSources,
      generationMode,
      contextsUsed: contexts.length,
    };
  }

  private async generate(query: string, contexts: GroundingContext[]): Promise<string> {
    let output: string | null;
    try {
      output = await this.generator.generateGroundedAnswer(query, contexts);
    } catch (error) {
      throw new PipelineError(
        "SummarizerUnavailable",
        `Answer generation failed: ${describeError(error)}`,
        { cause: error },
      );
    }

    if (!output?.trim()) {
      throw new PipelineError("SummarizerUnavailable", "Answer generation returned no content.");
    }
    return output;
  }
}
