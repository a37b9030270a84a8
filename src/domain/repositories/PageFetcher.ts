import type {
  FetchAttempt,
  FetchTarget,
} from "../value-objects/FetchAttempt.js";

export interface PageFetcher {
  fetch(target: FetchTarget, signal?: AbortSignal): Promise<FetchAttempt>;
}
