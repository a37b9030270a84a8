import type { ProxyEntry } from "./ProxyPool.js";

export interface HttpRequest {
  url: string;
  headers: Record<string, string>;
  timeoutMs: number;
  proxy?: ProxyEntry;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  body: string;
  /** Location header of a redirect, if any */
  location?: string;
}

/**
 * Performs one GET without following redirects. Resolves for every HTTP
 * status; rejects only on transport failures (DNS, reset, timeout, abort).
 */
export interface HttpTransport {
  get(request: HttpRequest): Promise<HttpResponse>;
}
