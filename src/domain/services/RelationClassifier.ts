import type {
  LiteralTiers,
  RelatedHashtagEntry,
  SemanticTiers,
} from "../entities/HashtagRecord.js";
import type { RawRelatedHashtag } from "../value-objects/DecodedTagPage.js";
import type { ClassifierConfig } from "../../shared/config/index.js";
import { normalizeHashtag } from "../value-objects/HashtagName.js";
import { humanizeCount, parseMagnitude } from "../../shared/utils/magnitude.js";

export type Tier = "frequent" | "average" | "rare";

export interface RelationClassification {
  /** Every rated candidate, magnitude descending */
  related: RelatedHashtagEntry[];
  literal: LiteralTiers;
  semantic: SemanticTiers;
  /** Candidate names whose magnitude text could not be read */
  unrated: string[];
}

const SEMANTIC_TIER: Record<Tier, keyof SemanticTiers> = {
  frequent: "relatedFrequent",
  average: "relatedAverage",
  rare: "relatedRare",
};

interface RatedCandidate {
  name: string;
  magnitude: number;
}

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1,
        current[j - 1] + 1,
        previous[j - 1] + cost
      );
    }
    previous = current;
  }
  return previous[b.length];
}

function sharedPrefixLength(a: string, b: string): number {
  let length = 0;
  while (length < a.length && length < b.length && a[length] === b[length]) {
    length++;
  }
  return length;
}

export class RelationClassifier {
  constructor(private readonly config: ClassifierConfig) {}

  /**
   * Inclusive lower bounds: a magnitude equal to a threshold lands in the
   * higher tier.
   */
  tierOf(magnitude: number): Tier {
    if (magnitude >= this.config.frequentThreshold) return "frequent";
    if (magnitude >= this.config.averageThreshold) return "average";
    return "rare";
  }

  isSemanticallyRelated(requested: string, candidate: string): boolean {
    const [shorter, longer] =
      requested.length <= candidate.length
        ? [requested, candidate]
        : [candidate, requested];

    if (shorter.length >= 3 && longer.includes(shorter)) return true;
    if (sharedPrefixLength(requested, candidate) >= this.config.minSharedStem) {
      return true;
    }

    const maxDistance = Math.floor(
      longer.length * this.config.maxEditDistanceRatio
    );
    return maxDistance > 0 && levenshtein(requested, candidate) <= maxDistance;
  }

  classify(
    requested: string,
    rawRelated: readonly RawRelatedHashtag[],
    options: { depth: number }
  ): RelationClassification {
    const self = normalizeHashtag(requested);
    const seen = new Set<string>([self]);
    const rated: RatedCandidate[] = [];
    const unrated: string[] = [];

    for (const raw of rawRelated) {
      const name = normalizeHashtag(raw.name);
      if (!name || seen.has(name)) continue;
      seen.add(name);

      const magnitude = parseMagnitude(raw.magnitudeText);
      if (magnitude === undefined) {
        unrated.push(name);
      } else {
        rated.push({ name, magnitude });
      }
    }

    // Array.prototype.sort is stable, so equal magnitudes keep page order
    const candidates = rated
      .sort((a, b) => b.magnitude - a.magnitude)
      .slice(0, options.depth);

    const result: RelationClassification = {
      related: [],
      literal: { frequent: [], average: [], rare: [] },
      semantic: { relatedFrequent: [], relatedAverage: [], relatedRare: [] },
      unrated,
    };

    for (const candidate of candidates) {
      const entry: RelatedHashtagEntry = {
        hash: `#${candidate.name}`,
        info: humanizeCount(candidate.magnitude),
      };
      const tier = this.tierOf(candidate.magnitude);

      result.related.push(entry);
      result.literal[tier].push(entry);

      if (this.isSemanticallyRelated(self, candidate.name)) {
        result.semantic[SEMANTIC_TIER[tier]].push(entry);
      }
    }

    return result;
  }
}
