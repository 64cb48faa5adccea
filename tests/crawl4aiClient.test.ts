import { describe, expect, it, vi } from "vitest";
import { Crawl4AiClient } from "../src/infra/crawl/crawl4aiClient.js";
import { HttpRequestInit } from "../src/infra/http/types.js";

const ENDPOINT = "http://crawl.test/md";

function clientReturning(body: unknown, status = 200) {
  const fetchImpl = vi.fn(
    async (_url: string, _init: HttpRequestInit) =>
      new Response(typeof body === "string" ? body : JSON.stringify(body), { status }),
  );
  return { client: new Crawl4AiClient({ endpoint: ENDPOINT }, fetchImpl), fetchImpl };
}

describe("Crawl4AiClient", () => {
  it("posts the crawl request and reads markdown", async () => {
    const { client, fetchImpl } = clientReturning({
      markdown: "# Ownership\nEach value has one owner.",
      metadata: { title: "Ownership" },
    });

    const document = await client.crawl("https://rust.example/own", new AbortController().signal);

    expect(document).toEqual({
      url: "https://rust.example/own",
      title: "Ownership",
      markdown: "# Ownership\nEach value has one owner.",
      format: "markdown",
    });
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe(ENDPOINT);
    expect(init.method).toBe("POST");
    expect(JSON.parse(init.body ?? "")).toEqual({
      url: "https://rust.example/own",
      f: "bm25",
      c: "0",
      skip_internal_links: true,
    });
  });

  it("unwraps a results envelope and falls back to cleaned html", async () => {
    const { client } = clientReturning({
      results: [{ success: true, cleaned_html: "<p>Borrowing</p>\n<p>rules</p>" }],
    });

    const document = await client.crawl("https://rust.example/borrow", new AbortController().signal);

    expect(document.format).toBe("cleaned_html");
    expect(document.markdown).toBe("Borrowing\nrules");
    expect(document.title).toBe("https://rust.example/borrow");
  });

  it("rejects a payload that reports failure", async () => {
    const { client } = clientReturning({ success: false, error_message: "blocked by robots.txt" });

    await expect(
      client.crawl("https://rust.example/x", new AbortController().signal),
    ).rejects.toThrow("blocked by robots.txt");
  });

  it("rejects a payload without extractable content", async () => {
    const { client } = clientReturning({ markdown: "   ", content: "" });

    await expect(
      client.crawl("https://rust.example/empty", new AbortController().signal),
    ).rejects.toThrow("No extractable content for https://rust.example/empty.");
  });

  it("rejects a non-2xx response with its status", async () => {
    const { client } = clientReturning("bad gateway", 502);

    await expect(
      client.crawl("https://rust.example/x", new AbortController().signal),
    ).rejects.toThrow("Crawl failed (502): bad gateway");
  });
});
