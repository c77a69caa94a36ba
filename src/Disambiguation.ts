import type { Production } from './GrammarElement.js';
import type { PackedNode, PackedParent } from './Sppf.js';

/**
 * Orders competing derivations of one forest node. A negative result prefers
 * `a`, a positive one `b`; zero leaves the two tied, which the extractor
 * reports as an ambiguity rather than picking one.
 */
export interface DisambiguationPolicy {
  readonly name: string;
  compare(a: PackedNode, b: PackedNode, parent: PackedParent): number;
}

/**
 * Earliest-declared production wins; for the same production the split with
 * the longest left part wins, which makes binary operators left-associative.
 */
export const defaultPolicy: DisambiguationPolicy = {
  name: 'default',
  compare(a, b) {
    if (a.production !== b.production) {
      return a.production.index - b.production.index;
    }
    return b.pivot - a.pivot;
  },
};

/** Treats every pair of derivations as tied: any ambiguity is an error. */
export const strictPolicy: DisambiguationPolicy = {
  name: 'strict',
  compare() {
    return 0;
  },
};

export type Associativity = 'left' | 'right' | 'none';

export interface PrecedenceLevel {
  productions: Production[];
  associativity: Associativity;
}

/**
 * Operator precedence over productions. The first level binds loosest, so
 * its productions are preferred nearer the root. Within a level the
 * associativity picks the split; `none` leaves the choice tied. Pairs involving
 * productions not listed fall through to `fallback`.
 */
export function precedencePolicy(
  levels: PrecedenceLevel[],
  fallback: DisambiguationPolicy = defaultPolicy,
): DisambiguationPolicy {
  const levelOf = new Map<Production, number>();
  levels.forEach((level, index) => {
    for (const production of level.productions) {
      levelOf.set(production, index);
    }
  });

  return {
    name: 'precedence',
    compare(a, b, parent) {
      const la = levelOf.get(a.production);
      const lb = levelOf.get(b.production);
      if (la === undefined || lb === undefined) {
        return fallback.compare(a, b, parent);
      }
      if (la !== lb) {
        return la - lb;
      }
      switch (levels[la].associativity) {
        case 'left':
          return b.pivot - a.pivot;
        case 'right':
          return a.pivot - b.pivot;
        case 'none':
          return 0;
      }
    },
  };
}

/** The first policy with an opinion decides. */
export function chainPolicies(...policies: DisambiguationPolicy[]): DisambiguationPolicy {
  return {
    name: policies.map(p => p.name).join('+'),
    compare(a, b, parent) {
      for (const policy of policies) {
        const order = policy.compare(a, b, parent);
        if (order !== 0) return order;
      }
      return 0;
    },
  };
}
