import { componentLogger, type Logger } from "../../utils/logger.js";
import { AddressMatcher } from "./AddressMatcher.js";
import { AssetMatcher } from "./AssetMatcher.js";
import { DefaultMatcher } from "./DefaultMatcher.js";
import { PersonMatcher } from "./PersonMatcher.js";
import type { MatcherKind, NodeMatcher } from "./types.js";

const DEFAULT_TYPE_MAPPING: Record<string, MatcherKind> = {
  address: "address",
  person: "person",
  user: "person",
  contact: "person",
  asset: "asset",
  vehicle: "asset"
};

function typeKey(type: string): string {
  return type.trim().replace(/[\s_-]+/g, "").toLowerCase();
}

export class NodeMatcherRegistry {
  private readonly matchers: Record<MatcherKind, NodeMatcher>;
  private readonly mapping = new Map<string, MatcherKind>();

  constructor(
    options: {
      logger?: Logger;
      typeMapping?: Record<string, MatcherKind>;
      /** Vector threshold for matchers that do not set their own. */
      defaultSimilarityThreshold?: number;
    } = {}
  ) {
    const logger = options.logger ?? componentLogger("NodeMatcherRegistry");
    const threshold = options.defaultSimilarityThreshold;
    this.matchers = {
      default: new DefaultMatcher(logger, threshold),
      address: new AddressMatcher(logger, threshold),
      person: new PersonMatcher(logger, threshold),
      asset: new AssetMatcher(logger, threshold)
    };

    for (const [type, kind] of Object.entries({ ...DEFAULT_TYPE_MAPPING, ...options.typeMapping })) {
      this.mapping.set(typeKey(type), kind);
    }
  }

  /** Unknown or blank types resolve to the default matcher. */
  kindFor(type: string): MatcherKind {
    return this.mapping.get(typeKey(type)) ?? "default";
  }

  forType(type: string): NodeMatcher {
    return this.matchers[this.kindFor(type)];
  }
}
