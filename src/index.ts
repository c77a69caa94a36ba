export { Grammar, ref } from './Grammar.js';
export type {
  FirstSet,
  GrammarDefinition,
  ItemDefinition,
  NonterminalReference,
  ProductionDefinition,
  RuleDefinition,
  SymbolDefinition,
} from './Grammar.js';

export {
  Terminal,
  LiteralTerminal,
  CharacterClass,
  PatternTerminal,
  EndOfInput,
  EndOfFile,
  Nonterminal,
  Production,
  GrammarSlot,
  describeSymbol,
} from './GrammarElement.js';
export type {
  CharacterClassOptions,
  CharacterRange,
  GrammarSymbol,
  LiteralOptions,
  NonterminalKind,
  ProductionItem,
  TerminalOptions,
} from './GrammarElement.js';

export { GrammarBuilder, ELEMENT_LABEL, SEPARATOR_LABEL } from './GrammarBuilder.js';
export type {
  AlternativeDefinition,
  ElementReference,
  GrammarOptions,
  LabeledReference,
  RepeatOptions,
  RuleOptions,
} from './GrammarBuilder.js';

export {
  ident,
  lifetime,
  punct,
  literal,
  whitespace,
  lineComment,
  blockComment,
  addTokenTreeRules,
} from './BuiltinTerminals.js';
export type { TokenTreeTerminals } from './BuiltinTerminals.js';

export { parse, GllEngine } from './Parser.js';
export type { ParseOptions, ParseResult } from './Parser.js';

export { ParseForest } from './ParseForest.js';
export type { ParseStats } from './ParseForest.js';

export {
  SppfBuilder,
  SymbolNode,
  IntermediateNode,
  TerminalNode,
  EpsilonNode,
  PackedNode,
} from './Sppf.js';
export type { PackedParent, SppfNode, TerminalScan, TriviaMatch } from './Sppf.js';

export { Gss, GssNode } from './Gss.js';
export type { GssEdge } from './Gss.js';

export { CstNode, CstToken, LineMap } from './CstNode.js';
export type { CstChild, TextLocation } from './CstNode.js';

export { defaultPolicy, strictPolicy, precedencePolicy, chainPolicies } from './Disambiguation.js';
export type { Associativity, DisambiguationPolicy, PrecedenceLevel } from './Disambiguation.js';

export { extractCst, enumerateCsts } from './CstExtractor.js';
export type { EnumerateOptions, ExtractOptions, ExtractResult } from './CstExtractor.js';

export { AstRewriter } from './AstRewriter.js';
export type { LoweringContext, LoweringTransform, RewriterOptions } from './AstRewriter.js';

export {
  GllError,
  ErrorSeverity,
  GrammarError,
  ParseFailure,
  AmbiguityError,
  UnhandledProductionError,
  LoweringError,
  ParseAbortedError,
} from './Errors.js';
export type { FailedAttempt, GllErrorOptions } from './Errors.js';

export { getLogger, setLogLevel, resolveLogLevel } from './Logger.js';
export type { LoggerComponent } from './Logger.js';
