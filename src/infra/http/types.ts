import { Agent, fetch, type Dispatcher } from "undici";

export interface HttpRequestInit {
  method: "GET" | "POST";
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
  dispatcher?: Dispatcher;
}

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type HttpFetch = (url: string, init: HttpRequestInit) => Promise<HttpResponseLike>;

export const undiciFetch: HttpFetch = (url, init) => fetch(url, init);

export interface KeepAlivePoolOptions {
  connectTimeoutMs: number;
  maxConnections: number;
}

/** Keep-alive connection pool with a bounded connect phase. */
export function createKeepAliveAgent(options: KeepAlivePoolOptions): Agent {
  return new Agent({
    connect: { timeout: options.connectTimeoutMs },
    connections: options.maxConnections,
    keepAliveTimeout: 10_000,
  });
}

export function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  );
}
