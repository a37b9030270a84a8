import type { ProxyStrategy } from "../../shared/config/index.js";

export interface ProxyEntry {
  protocol: "http" | "https";
  host: string;
  port: number;
  auth?: { username: string; password: string };
  /** host:port, safe to log */
  label: string;
}

export function parseProxyUrl(raw: string): ProxyEntry {
  const url = new URL(raw);
  const protocol = url.protocol.replace(/:$/, "");
  if (protocol !== "http" && protocol !== "https") {
    throw new Error(`Unsupported proxy protocol "${protocol}" in ${url.host}`);
  }

  const port = url.port ? Number(url.port) : protocol === "https" ? 443 : 80;
  const entry: ProxyEntry = {
    protocol,
    host: url.hostname,
    port,
    label: `${url.hostname}:${port}`,
  };

  if (url.username) {
    entry.auth = {
      username: decodeURIComponent(url.username),
      password: decodeURIComponent(url.password),
    };
  }

  return entry;
}

/**
 * Read-shared pool of outbound identities. An empty pool means direct
 * connections.
 */
export class ProxyPool {
  private cursor = 0;

  constructor(
    private readonly entries: readonly ProxyEntry[],
    private readonly strategy: ProxyStrategy = "round-robin",
    private readonly random: () => number = Math.random
  ) {}

  static fromUrls(urls: string[], strategy?: ProxyStrategy): ProxyPool {
    return new ProxyPool(urls.map(parseProxyUrl), strategy);
  }

  get size(): number {
    return this.entries.length;
  }

  next(): ProxyEntry | undefined {
    if (this.entries.length === 0) return undefined;

    if (this.strategy === "random") {
      return this.entries[Math.floor(this.random() * this.entries.length)];
    }

    const entry = this.entries[this.cursor % this.entries.length];
    this.cursor = (this.cursor + 1) % this.entries.length;
    return entry;
  }
}
