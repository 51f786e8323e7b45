/**
 * Parser Module
 * Newick tree statements into trees
 */

export {
  parseCommentMetadata,
  processCommentsForItem,
  type CommentMetadataOptions,
  type FieldValueType,
} from './metadata.js';
export {
  DEFAULT_READER_OPTIONS,
  parseReaderConfig,
  resolveReaderOptions,
  ROOTING_VALUES,
  type EdgeLengthType,
  type NewickReaderOptions,
  type ReaderConfig,
  type ResolvedReaderOptions,
  type Rooting,
} from './options.js';
export {
  parseTreeStatement,
  parseTreeWeight,
  resolveRooting,
} from './parser-statement.js';
export {
  NewickReader,
  readTrees,
  type ReadTreesFactories,
  type ReadTreesOptions,
  type ReadTreesResult,
} from './reader.js';
