/**
 * Phylotext Core
 * Newick/NEXUS tokenizer, taxon resolution, tree statement parsing and writing
 */

// ============================================================
// LEXER
// ============================================================
export {
  createFileSource,
  createStringSource,
  isDelimiter,
  NexusTokenizer,
  resolveTokenizerConfig,
  TOKEN_TYPES,
  Tokenizer,
  type CharacterSource,
  type NexusTokenizerOptions,
  type ResolvedTokenizerConfig,
  type Token,
  type TokenizerConfig,
  type TokenType,
} from './lexer/index.js';

// ============================================================
// DATA MODEL
// ============================================================
export {
  Edge,
  findAnnotation,
  Node,
  Taxon,
  TaxonNamespace,
  Tree,
  type Annotated,
  type Annotation,
  type AnnotationValue,
  type NodeOptions,
  type TaxonNamespaceFactory,
  type TaxonNamespaceOptions,
  type TreeFactory,
  type TreeOptions,
} from './model/index.js';

// ============================================================
// TAXON RESOLUTION
// ============================================================
export {
  TaxonSymbolResolver,
  withTaxonSymbolResolver,
  type SymbolResolver,
  type TaxonSymbolResolverOptions,
} from './taxa/index.js';

// ============================================================
// PARSER
// ============================================================
export {
  DEFAULT_READER_OPTIONS,
  NewickReader,
  parseCommentMetadata,
  parseReaderConfig,
  parseTreeWeight,
  processCommentsForItem,
  readTrees,
  resolveReaderOptions,
  resolveRooting,
  ROOTING_VALUES,
  type CommentMetadataOptions,
  type EdgeLengthType,
  type FieldValueType,
  type NewickReaderOptions,
  type ReadTreesFactories,
  type ReadTreesOptions,
  type ReadTreesResult,
  type ReaderConfig,
  type ResolvedReaderOptions,
  type Rooting,
} from './parser/index.js';

// ============================================================
// WRITER
// ============================================================
export {
  escapeNexusToken,
  formatAnnotationsAsComment,
  writeNewick,
  type EscapeOptions,
  type NewickWriterOptions,
} from './writer/index.js';

// ============================================================
// CONFIGURATION
// ============================================================
export {
  CONFIG_FILE_NAME,
  createDefaultReaderOptions,
  loadReaderConfig,
} from './config.js';

// ============================================================
// OBSERVABILITY
// ============================================================
export type {
  ReadErrorEvent,
  ReaderObservability,
  StatementStartEvent,
  TaxonCreatedEvent,
  TreeCompleteEvent,
} from './observability.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';
export {
  ConfigError,
  createError,
  DuplicateTaxonError,
  LexerError,
  ParseError,
  PhyloError,
  TaxonError,
  UnexpectedEndOfStreamError,
  UnterminatedQuoteError,
  type PhyloErrorData,
} from './error-classes.js';
export {
  formatLocation,
  type SourceLocation,
  type SourceSpan,
} from './source-location.js';
