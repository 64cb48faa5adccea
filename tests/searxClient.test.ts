import { describe, expect, it, vi } from "vitest";
import { PipelineError } from "../src/domain/errors.js";
import { HttpRequestInit } from "../src/infra/http/types.js";
import { SearxClient, toTimeRange } from "../src/infra/search/searxClient.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function createClient(fetchImpl: (url: string, init: HttpRequestInit) => Promise<Response>) {
  return new SearxClient(
    { baseUrl: "http://searx.test/search", language: "en", timeoutMs: 1_000 },
    fetchImpl,
  );
}

describe("SearxClient", () => {
  it("sends the query parameters and ranks results by score", async () => {
    const fetchImpl = vi.fn(async (_url: string, _init: HttpRequestInit) =>
      jsonResponse({
        results: [
          { url: "https://low.example", title: "Low", content: "low", score: 0.2 },
          { url: "https://high.example", title: "High", content: "high", score: 2.5 },
          { url: "ftp://files.example", title: "Ftp", score: 9 },
          { title: "missing url" },
          { url: "https://none.example", title: "  " },
        ],
      }),
    );
    const client = createClient(fetchImpl);

    const results = await client.search("rust ownership", { k: 3, freshnessDays: 7 });

    expect(results).toEqual([
      { url: "https://high.example", title: "High", snippet: "high" },
      { url: "https://low.example", title: "Low", snippet: "low" },
      { url: "https://none.example", title: "https://none.example", snippet: "" },
    ]);

    const [requestedUrl, init] = fetchImpl.mock.calls[0];
    const params = new URL(requestedUrl).searchParams;
    expect(params.get("q")).toBe("rust ownership");
    expect(params.get("format")).toBe("json");
    expect(params.get("language")).toBe("en");
    expect(params.get("safesearch")).toBe("1");
    expect(params.get("categories")).toBe("general");
    expect(params.get("time_range")).toBe("week");
    expect(init.method).toBe("GET");
  });

  it("truncates to k", async () => {
    const results = Array.from({ length: 10 }, (_, i) => ({
      url: `https://site${i}.example`,
      title: `Site ${i}`,
      score: 10 - i,
    }));
    const client = createClient(async () => jsonResponse({ results }));

    const ranked = await client.search("query", { k: 2 });
    expect(ranked.map((result) => result.url)).toEqual([
      "https://site0.example",
      "https://site1.example",
    ]);
  });

  it("uses the request language over the default", async () => {
    const fetchImpl = vi.fn(async (_url: string, _init: HttpRequestInit) => jsonResponse({ results: [] }));
    const client = createClient(fetchImpl);

    await client.search("query", { language: "pt-BR" });

    expect(new URL(fetchImpl.mock.calls[0][0]).searchParams.get("language")).toBe("pt-BR");
  });

  it("treats a missing results array as no results", async () => {
    const client = createClient(async () => jsonResponse({ query: "x" }));
    expect(await client.search("x")).toEqual([]);
  });

  it("fails with UpstreamUnavailable on a non-2xx status", async () => {
    const client = createClient(async () => new Response("engine down", { status: 502 }));

    const error = await client.search("x").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PipelineError);
    expect(error).toMatchObject({
      kind: "UpstreamUnavailable",
      message: "SearxNG search failed (502): engine down",
    });
  });

  it("fails with UpstreamUnavailable on a transport error", async () => {
    const client = createClient(async () => {
      throw new TypeError("fetch failed");
    });

    await expect(client.search("x")).rejects.toMatchObject({
      kind: "UpstreamUnavailable",
      message: "fetch failed",
    });
  });

  it("reports a timeout", async () => {
    const client = createClient(async () => {
      const error = new Error("The operation was aborted due to timeout");
      error.name = "TimeoutError";
      throw error;
    });

    await expect(client.search("x")).rejects.toMatchObject({
      kind: "UpstreamUnavailable",
      message: "SearxNG search timed out after 1000ms",
    });
  });

  it("maps freshness to a searx time range", () => {
    expect(toTimeRange(undefined)).toBeNull();
    expect(toTimeRange(1)).toBe("day");
    expect(toTimeRange(30)).toBe("month");
    expect(toTimeRange(90)).toBe("year");
  });
});
