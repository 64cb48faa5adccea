import pLimit from "p-limit";
import { describeError } from "../domain/errors.js";
import { CrawledDocument, CrawlOutcome } from "../domain/types.js";
import { CrawlBackend } from "../infra/crawl/crawl4aiClient.js";
import { Logger, NullLogger } from "../utils/logger.js";

export interface CrawlCoordinatorOptions {
  concurrency: number;
  timeoutMs: number;
}

export interface CrawlGateStats {
  active: number;
  pending: number;
}

class CrawlTimeoutError extends Error {
  constructor(url: string, timeoutMs: number) {
    super(`Crawl of ${url} timed out after ${timeoutMs}ms`);
    this.name = "CrawlTimeoutError";
  }
}

type Limit = ReturnType<typeof pLimit>;

/**
 * Fans crawls out through one admission gate shared by every request. Each
 * URL yields exactly one outcome; a failed or timed-out crawl never affects
 * its siblings.
 */
export class CrawlCoordinator {
  private readonly gate: Limit;

  constructor(
    private readonly backend: CrawlBackend,
    private readonly options: CrawlCoordinatorOptions,
    private readonly logger: Logger = new NullLogger(),
  ) {
    this.gate = pLimit(Math.max(1, Math.floor(options.concurrency)));
  }

  async crawlAll(urls: string[], maxResults: number): Promise<CrawlOutcome[]> {
    const targets = urls.slice(0, Math.max(0, Math.floor(maxResults)));
    return Promise.all(targets.map((url) => this.admit(url)));
  }

  stats(): CrawlGateStats {
    return {
      active: this.gate.activeCount,
      pending: this.gate.pendingCount,
    };
  }

  /**
   * Resolves with the outcome as soon as the crawl finishes or times out. The
   * gate slot stays taken until the backend call itself settles, so a backend
   * that ignores the abort signal still counts against the concurrency cap.
   */
  private admit(url: string): Promise<CrawlOutcome> {
    return new Promise<CrawlOutcome>((resolve, reject) => {
      this.gate(async () => {
        const controller = new AbortController();
        const crawl = this.backend.crawl(url, controller.signal);
        resolve(await this.awaitOutcome(url, crawl, controller));
        await Promise.allSettled([crawl]);
      }).catch(reject);
    });
  }

  private async awaitOutcome(
    url: string,
    crawl: Promise<CrawledDocument>,
    controller: AbortController,
  ): Promise<CrawlOutcome> {
    const startedAt = Date.now();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new CrawlTimeoutError(url, this.options.timeoutMs);
        controller.abort(error);
        reject(error);
      }, this.options.timeoutMs);
    });

    try {
      const document = await Promise.race([crawl, timeout]);
      this.logger.debug("crawl succeeded", {
        url,
        format: document.format,
        chars: document.markdown.length,
        elapsed_ms: Date.now() - startedAt,
      });
      return { ok: true, document };
    } catch (error) {
      const kind = error instanceof CrawlTimeoutError ? "timeout" : "error";
      const reason = describeError(error);
      this.logger.warn("crawl failed", { url, kind, reason, elapsed_ms: Date.now() - startedAt });
      return { ok: false, url, kind, reason };
    } finally {
      clearTimeout(timer);
    }
  }
}
