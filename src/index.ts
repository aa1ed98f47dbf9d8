/**
 * IDL Trait Parser
 * Exports lexer, parser, value nodes, trait records and error types
 */

export { LexerError, tokenize, type TokenizeOptions } from './lexer/index.js';
export {
  DEFAULT_MAX_NESTING_DEPTH,
  Parser,
  type ParserOptions,
  type SharedStateParserOptions,
  type ParserState,
  createParserState,
  parseApply,
  parseLeadingTraits,
  parseNodeValue,
  parseTraits,
} from './parser/index.js';
export {
  extractTraitBlocks,
  type TraitBlock,
  type TraitBlockKind,
} from './extract.js';

// ============================================================
// TOKENS AND LOCATIONS
// ============================================================
export {
  INSIGNIFICANT_TOKENS,
  TOKEN_TYPES,
  type Token,
  type TokenType,
} from './token-types.js';
export {
  formatLocation,
  type SourceLocation,
  type SourceSpan,
} from './source-location.js';

// ============================================================
// VALUES AND TRAITS
// ============================================================
export {
  type ArrayNode,
  type BooleanNode,
  type NodeValue,
  type NullNode,
  type NumberNode,
  type ObjectNode,
  type StringNode,
  type ValueNode,
  type ValueNodeType,
  nodeToValue,
} from './node-types.js';
export {
  type ApplyStatement,
  DEFAULT_DOCUMENTATION_TRAIT,
  type TraitApplication,
  type TraitKind,
} from './trait-types.js';
export {
  type ForwardReference,
  ForwardReferenceCollector,
  type ReferenceResolution,
  type ReferenceResolver,
} from './resolver.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';
export {
  createError,
  IdlError,
  type IdlErrorData,
  ParseError,
  ResourceLimitError,
} from './error-classes.js';

// ============================================================
// CONFIGURATION
// ============================================================
export {
  createDefaultConfig,
  loadConfig,
  type OutputFormat,
  type TraitsConfig,
} from './config.js';
