import { describe, expect, it } from "vitest";
import { CrawlCoordinator } from "../src/services/crawlCoordinator.js";
import { FakeCrawlBackend } from "./helpers/fakes.js";

describe("CrawlCoordinator", () => {
  it("returns one outcome per crawled url in input order", async () => {
    const backend = new FakeCrawlBackend({
      "https://a.example": { kind: "page", title: "A", markdown: "alpha", delayMs: 15 },
      "https://b.example": { kind: "error", message: "HTTP 503" },
      "https://c.example": { kind: "page", title: "C", markdown: "gamma" },
    });
    const coordinator = new CrawlCoordinator(backend, { concurrency: 3, timeoutMs: 1_000 });

    const outcomes = await coordinator.crawlAll(
      ["https://a.example", "https://b.example", "https://c.example"],
      3,
    );

    expect(outcomes).toEqual([
      {
        ok: true,
        document: { url: "https://a.example", title: "A", markdown: "alpha", format: "markdown" },
      },
      { ok: false, url: "https://b.example", kind: "error", reason: "HTTP 503" },
      {
        ok: true,
        document: { url: "https://c.example", title: "C", markdown: "gamma", format: "markdown" },
      },
    ]);
  });

  it("crawls only the first maxResults urls", async () => {
    const backend = new FakeCrawlBackend({
      "https://a.example": { kind: "page", title: "A", markdown: "alpha" },
      "https://b.example": { kind: "page", title: "B", markdown: "beta" },
    });
    const coordinator = new CrawlCoordinator(backend, { concurrency: 2, timeoutMs: 1_000 });

    const outcomes = await coordinator.crawlAll(["https://a.example", "https://b.example"], 1);

    expect(outcomes).toHaveLength(1);
    expect(backend.crawled).toEqual(["https://a.example"]);
  });

  it("turns a crawl that never settles into a timeout outcome", async () => {
    const backend = new FakeCrawlBackend({
      "https://slow.example": { kind: "hang" },
      "https://fast.example": { kind: "page", title: "Fast", markdown: "done" },
    });
    const coordinator = new CrawlCoordinator(backend, { concurrency: 2, timeoutMs: 30 });

    const outcomes = await coordinator.crawlAll(["https://slow.example", "https://fast.example"], 2);

    expect(outcomes[0]).toEqual({
      ok: false,
      url: "https://slow.example",
      kind: "timeout",
      reason: "Crawl of https://slow.example timed out after 30ms",
    });
    expect(outcomes[1].ok).toBe(true);
  });

  it("holds a timed-out crawl's slot until the backend settles", async () => {
    const backend = new FakeCrawlBackend({
      "https://stubborn.example": { kind: "stall", title: "S", markdown: "late", delayMs: 60 },
      "https://next.example": { kind: "page", title: "N", markdown: "next" },
    });
    const coordinator = new CrawlCoordinator(backend, { concurrency: 1, timeoutMs: 20 });

    const outcomes = await coordinator.crawlAll(["https://stubborn.example", "https://next.example"], 2);

    expect(outcomes[0]).toEqual({
      ok: false,
      url: "https://stubborn.example",
      kind: "timeout",
      reason: "Crawl of https://stubborn.example timed out after 20ms",
    });
    expect(outcomes[1].ok).toBe(true);
    expect(backend.maxInFlight).toBe(1);
  });

  it("never exceeds the admission gate across concurrent calls", async () => {
    const pages = Object.fromEntries(
      Array.from({ length: 8 }, (_, i) => [
        `https://site${i}.example`,
        { kind: "page" as const, title: `Site ${i}`, markdown: `body ${i}`, delayMs: 10 },
      ]),
    );
    const backend = new FakeCrawlBackend(pages);
    const coordinator = new CrawlCoordinator(backend, { concurrency: 3, timeoutMs: 1_000 });
    const urls = Object.keys(pages);

    const [first, second] = await Promise.all([
      coordinator.crawlAll(urls.slice(0, 4), 4),
      coordinator.crawlAll(urls.slice(4), 4),
    ]);

    expect(first.every((outcome) => outcome.ok)).toBe(true);
    expect(second.every((outcome) => outcome.ok)).toBe(true);
    expect(backend.maxInFlight).toBe(3);
  });
});
