import { AdaptiveRateLimiterImpl } from "../http/AdaptiveRateLimiterImpl.js";
import { AxiosTransport } from "../http/AxiosTransport.js";
import { ProxyPool } from "../http/ProxyPool.js";
import { HashtagPageFetcherImpl } from "../scrapers/HashtagPageFetcherImpl.js";
import { TagPageDecoderImpl } from "../decoders/TagPageDecoderImpl.js";
import { JsonResultSinkImpl } from "../exporters/JsonResultSinkImpl.js";
import type { HttpTransport } from "../http/HttpTransport.js";
import type { PageDecoder } from "../../domain/repositories/PageDecoder.js";
import type { PageFetcher } from "../../domain/repositories/PageFetcher.js";
import type { RateLimiter } from "../../domain/repositories/RateLimiter.js";
import type { ResultSink } from "../../domain/repositories/ResultSink.js";
import { SCRAPER_CONFIG } from "../../shared/config/index.js";

/**
 * Dependency Injection Container
 * Provides instances of infrastructure implementations
 */
export class Container {
  private transport: HttpTransport | null = null;
  private proxyPool: ProxyPool | null = null;
  private pageDecoder: PageDecoder | null = null;
  private resultSink: ResultSink | null = null;

  /**
   * A new limiter per run: pacing state never leaks between runs
   */
  createRateLimiter(): RateLimiter {
    return new AdaptiveRateLimiterImpl(SCRAPER_CONFIG.rateLimiter);
  }

  createPageFetcher(rateLimiter: RateLimiter): PageFetcher {
    return new HashtagPageFetcherImpl(
      this.getTransport(),
      this.getProxyPool(),
      rateLimiter,
      SCRAPER_CONFIG.fetcher
    );
  }

  getPageDecoder(): PageDecoder {
    if (!this.pageDecoder) {
      this.pageDecoder = new TagPageDecoderImpl(SCRAPER_CONFIG.fetcher.baseUrl);
    }
    return this.pageDecoder;
  }

  getResultSink(): ResultSink {
    if (!this.resultSink) {
      this.resultSink = new JsonResultSinkImpl(SCRAPER_CONFIG.outputDir);
    }
    return this.resultSink;
  }

  private getTransport(): HttpTransport {
    if (!this.transport) {
      this.transport = new AxiosTransport();
    }
    return this.transport;
  }

  private getProxyPool(): ProxyPool {
    if (!this.proxyPool) {
      this.proxyPool = ProxyPool.fromUrls(
        SCRAPER_CONFIG.proxies,
        SCRAPER_CONFIG.proxyStrategy
      );
    }
    return this.proxyPool;
  }

  async cleanup(): Promise<void> {
    this.transport = null;
    this.proxyPool = null;
    this.pageDecoder = null;
    this.resultSink = null;
  }
}

// Singleton instance
export const container = new Container();
