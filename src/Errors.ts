import type { TextLocation } from './CstNode.js';
import type { Terminal } from './GrammarElement.js';

/**
 * Severity of an engine error. Recoverable errors describe user-visible outcomes
 * (input that does not parse, an ambiguous span); fatal ones describe caller defects.
 */
export enum ErrorSeverity {
  Recoverable = 'recoverable',
  Fatal = 'fatal',
}

export interface GllErrorOptions {
  code: string;
  severity: ErrorSeverity;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base class for every error raised by the engine.
 */
export class GllError extends Error {
  readonly code: string;
  readonly severity: ErrorSeverity;
  readonly details: Record<string, unknown>;

  constructor(message: string, options: GllErrorOptions) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code;
    this.severity = options.severity;
    this.details = options.details ?? {};
  }
}

/** Malformed grammar, detected while the grammar model is constructed. */
export class GrammarError extends GllError {
  readonly nonterminal: string | null;
  readonly productionIndex: number | null;

  constructor(
    message: string,
    context: { nonterminal?: string; productionIndex?: number } = {},
  ) {
    super(message, {
      code: 'GRAMMAR_ERROR',
      severity: ErrorSeverity.Fatal,
      details: { ...context },
    });
    this.nonterminal = context.nonterminal ?? null;
    this.productionIndex = context.productionIndex ?? null;
  }
}

export interface FailedAttempt {
  /** The terminal tried, or null when the end of input was expected. */
  terminal: Terminal | null;
  /** Description of what was expected, e.g. `'b'` or `ident`. */
  expected: string;
  offset: number;
}

/**
 * The input does not match the grammar. Carries the furthest offset at which a
 * terminal was attempted and everything that was expected there.
 */
export class ParseFailure extends GllError {
  readonly offset: number;
  readonly location: TextLocation;
  readonly expected: string[];
  readonly attempts: FailedAttempt[];

  constructor(location: TextLocation, attempts: FailedAttempt[]) {
    const expected = [...new Set(attempts.map(a => a.expected))];
    const message =
      expected.length > 0
        ? `Expected ${expected.join(' or ')} at line ${location.line}, column ${location.column}`
        : `Unexpected input at line ${location.line}, column ${location.column}`;
    super(message, {
      code: 'PARSE_FAILURE',
      severity: ErrorSeverity.Recoverable,
      details: { offset: location.index, expected },
    });
    this.offset = location.index;
    this.location = location;
    this.expected = expected;
    this.attempts = attempts;
  }
}

/** A span the active disambiguation policy could not resolve to a single derivation. */
export class AmbiguityError extends GllError {
  readonly symbol: string;
  readonly start: number;
  readonly end: number;
  readonly location: TextLocation;
  readonly alternatives: number;

  constructor(symbol: string, start: number, end: number, location: TextLocation, alternatives: number) {
    super(
      `Ambiguous ${symbol} spanning [${start}, ${end}) at line ${location.line}, column ${location.column}: ` +
        `${alternatives} derivations remain after disambiguation`,
      {
        code: 'AMBIGUITY',
        severity: ErrorSeverity.Recoverable,
        details: { symbol, start, end, alternatives },
      },
    );
    this.symbol = symbol;
    this.start = start;
    this.end = end;
    this.location = location;
    this.alternatives = alternatives;
  }
}

/** No lowering rule is registered for a (nonterminal, production index) pair. */
export class UnhandledProductionError extends GllError {
  readonly nonterminal: string;
  readonly productionIndex: number;
  readonly start: number;
  readonly end: number;

  constructor(nonterminal: string, productionIndex: number, start: number, end: number) {
    super(
      `No lowering rule for ${nonterminal}#${productionIndex} (span [${start}, ${end}))`,
      {
        code: 'UNHANDLED_PRODUCTION',
        severity: ErrorSeverity.Fatal,
        details: { nonterminal, productionIndex, start, end },
      },
    );
    this.nonterminal = nonterminal;
    this.productionIndex = productionIndex;
    this.start = start;
    this.end = end;
  }
}

/** A lowering rule broke the child consumption contract. */
export class LoweringError extends GllError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, { code: 'LOWERING_ERROR', severity: ErrorSeverity.Fatal, details });
  }
}

/** The parse hit its deadline or descriptor budget and was abandoned. */
export class ParseAbortedError extends GllError {
  readonly reason: 'deadline' | 'descriptors';
  readonly descriptorsProcessed: number;

  constructor(reason: 'deadline' | 'descriptors', descriptorsProcessed: number) {
    super(
      reason === 'deadline'
        ? `Parse abandoned after its deadline (${descriptorsProcessed} descriptors processed)`
        : `Parse abandoned after exceeding its descriptor budget (${descriptorsProcessed} processed)`,
      {
        code: 'PARSE_ABORTED',
        severity: ErrorSeverity.Recoverable,
        details: { reason, descriptorsProcessed },
      },
    );
    this.reason = reason;
    this.descriptorsProcessed = descriptorsProcessed;
  }
}
