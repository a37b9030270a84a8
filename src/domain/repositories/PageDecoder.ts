import type { DecodedTagPage } from "../value-objects/DecodedTagPage.js";

export interface PageDecoder {
  /**
   * Throws a ScrapeError of kind "DecodeError" when the payload has no
   * recognizable structure.
   */
  decode(payload: string, context: { hashtag: string }): DecodedTagPage;
}
