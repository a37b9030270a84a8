import axios, { type AxiosInstance, type AxiosProxyConfig } from "axios";
import type { HttpRequest, HttpResponse, HttpTransport } from "./HttpTransport.js";
import type { ProxyEntry } from "./ProxyPool.js";

function toAxiosProxy(proxy: ProxyEntry | undefined): AxiosProxyConfig | false {
  if (!proxy) return false;
  return {
    protocol: proxy.protocol,
    host: proxy.host,
    port: proxy.port,
    auth: proxy.auth,
  };
}

export class AxiosTransport implements HttpTransport {
  private readonly client: AxiosInstance;

  constructor(client?: AxiosInstance) {
    this.client =
      client ??
      axios.create({
        maxRedirects: 0,
        responseType: "text",
        // Keep the raw body; the page decoder owns parsing
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
      });
  }

  async get(request: HttpRequest): Promise<HttpResponse> {
    const response = await this.client.get<unknown>(request.url, {
      headers: request.headers,
      timeout: request.timeoutMs,
      signal: request.signal,
      proxy: toAxiosProxy(request.proxy),
    });

    const location = response.headers["location"];

    return {
      status: response.status,
      body: typeof response.data === "string" ? response.data : "",
      location: typeof location === "string" ? location : undefined,
    };
  }
}
