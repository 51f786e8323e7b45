/**
 * Reader Options
 * Option records for the Newick statement parser and their validation
 */

import { ConfigError } from '../error-classes.js';
import type { Node } from '../model/tree.js';
import type { ReaderObservability } from '../observability.js';

// ============================================================
// TYPES
// ============================================================

export type Rooting =
  | 'default-unrooted'
  | 'default-rooted'
  | 'force-unrooted'
  | 'force-rooted';

export const ROOTING_VALUES: readonly Rooting[] = [
  'default-unrooted',
  'default-rooted',
  'force-unrooted',
  'force-rooted',
];

export type EdgeLengthType = 'float' | 'int';

/** Options that can be written as JSON */
export interface ReaderConfig {
  /**
   * How to settle rootedness. force-* ignores `[&R]`/`[&U]`; default-*
   * applies only when the statement carries neither. Unset leaves
   * isRooted undefined for unmarked trees.
   */
  rooting?: Rooting | undefined;
  /** Default: 'float' */
  edgeLengthType?: EdgeLengthType | undefined;
  /** Read past ':' values without storing them. Default: false */
  suppressEdgeLengths?: boolean | undefined;
  /** Turn `[&...]` comments into annotations. Default: true */
  extractCommentMetadata?: boolean | undefined;
  /** Read `[&W ...]` into tree.weight. Default: false */
  storeTreeWeights?: boolean | undefined;
  /** Weight of trees without `[&W ...]` when storing weights. Default: 1.0 */
  defaultTreeWeight?: number | undefined;
  /** Default: false */
  caseSensitiveTaxonLabels?: boolean | undefined;
  /** Keep '_' in unquoted labels. Default: false */
  preserveUnderscores?: boolean | undefined;
  /** Internal node labels are free labels, not taxa. Default: true */
  suppressInternalNodeTaxa?: boolean | undefined;
  /** Leaf labels are free labels, not taxa. Default: false */
  suppressLeafNodeTaxa?: boolean | undefined;
  /** Discard free labels of internal nodes. Default: false */
  suppressInternalNodeLabels?: boolean | undefined;
  /** Discard free labels of leaves. Default: false */
  suppressLeafNodeLabels?: boolean | undefined;
  /** Accept jplace `{n}` edge numbers. Default: false */
  parseJplaceTokens?: boolean | undefined;
  /** Store internal free labels on the subtending edge. Default: false */
  assignInternalLabelsToEdges?: boolean | undefined;
  /** Default: true */
  terminatingSemicolonRequired?: boolean | undefined;
}

export interface NewickReaderOptions extends ReaderConfig {
  /** Called once per node after its label, length and comments are read */
  finishNode?: ((node: Node) => void) | undefined;
  observability?: ReaderObservability | undefined;
}

export interface ResolvedReaderOptions {
  readonly rooting: Rooting | undefined;
  readonly edgeLengthType: EdgeLengthType;
  readonly suppressEdgeLengths: boolean;
  readonly extractCommentMetadata: boolean;
  readonly storeTreeWeights: boolean;
  readonly defaultTreeWeight: number;
  readonly caseSensitiveTaxonLabels: boolean;
  readonly preserveUnderscores: boolean;
  readonly suppressInternalNodeTaxa: boolean;
  readonly suppressLeafNodeTaxa: boolean;
  readonly suppressInternalNodeLabels: boolean;
  readonly suppressLeafNodeLabels: boolean;
  readonly parseJplaceTokens: boolean;
  readonly assignInternalLabelsToEdges: boolean;
  readonly terminatingSemicolonRequired: boolean;
  readonly finishNode: ((node: Node) => void) | undefined;
  readonly observability: ReaderObservability;
}

// ============================================================
// DEFAULTS
// ============================================================

export const DEFAULT_READER_OPTIONS: ResolvedReaderOptions = {
  rooting: undefined,
  edgeLengthType: 'float',
  suppressEdgeLengths: false,
  extractCommentMetadata: true,
  storeTreeWeights: false,
  defaultTreeWeight: 1.0,
  caseSensitiveTaxonLabels: false,
  preserveUnderscores: false,
  suppressInternalNodeTaxa: true,
  suppressLeafNodeTaxa: false,
  suppressInternalNodeLabels: false,
  suppressLeafNodeLabels: false,
  parseJplaceTokens: false,
  assignInternalLabelsToEdges: false,
  terminatingSemicolonRequired: true,
  finishNode: undefined,
  observability: {},
};

// ============================================================
// VALIDATION
// ============================================================

const BOOLEAN_OPTIONS = [
  'suppressEdgeLengths',
  'extractCommentMetadata',
  'storeTreeWeights',
  'caseSensitiveTaxonLabels',
  'preserveUnderscores',
  'suppressInternalNodeTaxa',
  'suppressLeafNodeTaxa',
  'suppressInternalNodeLabels',
  'suppressLeafNodeLabels',
  'parseJplaceTokens',
  'assignInternalLabelsToEdges',
  'terminatingSemicolonRequired',
] as const;

type BooleanOption = (typeof BOOLEAN_OPTIONS)[number];

function isBooleanOption(key: string): key is BooleanOption {
  return BOOLEAN_OPTIONS.some((name) => name === key);
}

function isRooting(value: unknown): value is Rooting {
  return ROOTING_VALUES.some((rooting) => rooting === value);
}

function isEdgeLengthType(value: unknown): value is EdgeLengthType {
  return value === 'float' || value === 'int';
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate an untyped record into a ReaderConfig.
 * Keys whose value is undefined count as absent.
 * @throws ConfigError on unknown keys or values of the wrong type
 */
export function parseReaderConfig(data: unknown): ReaderConfig {
  if (!isRecord(data)) {
    throw new ConfigError('reader options must be an object');
  }

  const config: ReaderConfig = {};
  for (const [key, value] of Object.entries(data)) {
    if (value === undefined) continue;

    if (isBooleanOption(key)) {
      if (typeof value !== 'boolean') {
        throw new ConfigError(`${key} must be a boolean`);
      }
      config[key] = value;
      continue;
    }

    switch (key) {
      case 'rooting':
        if (!isRooting(value)) {
          throw new ConfigError(
            `Unrecognized rooting directive: '${String(value)}' (must be one of ${ROOTING_VALUES.join(', ')})`
          );
        }
        config.rooting = value;
        break;
      case 'edgeLengthType':
        if (!isEdgeLengthType(value)) {
          throw new ConfigError(
            `edgeLengthType must be 'float' or 'int', got '${String(value)}'`
          );
        }
        config.edgeLengthType = value;
        break;
      case 'defaultTreeWeight':
        if (typeof value !== 'number' || !Number.isFinite(value)) {
          throw new ConfigError('defaultTreeWeight must be a finite number');
        }
        config.defaultTreeWeight = value;
        break;
      default:
        throw new ConfigError(`unknown option ${key}`);
    }
  }
  return config;
}

/**
 * Fill defaults and check option combinations.
 * @throws ConfigError on unknown keys, bad values or conflicting options
 */
export function resolveReaderOptions(
  options: NewickReaderOptions = {}
): ResolvedReaderOptions {
  const { finishNode, observability, ...rest } = options;
  if (finishNode !== undefined && typeof finishNode !== 'function') {
    throw new ConfigError('finishNode must be a function');
  }
  const config = parseReaderConfig(rest);
  const resolved: ResolvedReaderOptions = {
    rooting: config.rooting ?? DEFAULT_READER_OPTIONS.rooting,
    edgeLengthType:
      config.edgeLengthType ?? DEFAULT_READER_OPTIONS.edgeLengthType,
    suppressEdgeLengths:
      config.suppressEdgeLengths ?? DEFAULT_READER_OPTIONS.suppressEdgeLengths,
    extractCommentMetadata:
      config.extractCommentMetadata ??
      DEFAULT_READER_OPTIONS.extractCommentMetadata,
    storeTreeWeights:
      config.storeTreeWeights ?? DEFAULT_READER_OPTIONS.storeTreeWeights,
    defaultTreeWeight:
      config.defaultTreeWeight ?? DEFAULT_READER_OPTIONS.defaultTreeWeight,
    caseSensitiveTaxonLabels:
      config.caseSensitiveTaxonLabels ??
      DEFAULT_READER_OPTIONS.caseSensitiveTaxonLabels,
    preserveUnderscores:
      config.preserveUnderscores ?? DEFAULT_READER_OPTIONS.preserveUnderscores,
    suppressInternalNodeTaxa:
      config.suppressInternalNodeTaxa ??
      DEFAULT_READER_OPTIONS.suppressInternalNodeTaxa,
    suppressLeafNodeTaxa:
      config.suppressLeafNodeTaxa ??
      DEFAULT_READER_OPTIONS.suppressLeafNodeTaxa,
    suppressInternalNodeLabels:
      config.suppressInternalNodeLabels ??
      DEFAULT_READER_OPTIONS.suppressInternalNodeLabels,
    suppressLeafNodeLabels:
      config.suppressLeafNodeLabels ??
      DEFAULT_READER_OPTIONS.suppressLeafNodeLabels,
    parseJplaceTokens:
      config.parseJplaceTokens ?? DEFAULT_READER_OPTIONS.parseJplaceTokens,
    assignInternalLabelsToEdges:
      config.assignInternalLabelsToEdges ??
      DEFAULT_READER_OPTIONS.assignInternalLabelsToEdges,
    terminatingSemicolonRequired:
      config.terminatingSemicolonRequired ??
      DEFAULT_READER_OPTIONS.terminatingSemicolonRequired,
    finishNode,
    observability: observability ?? {},
  };

  if (resolved.assignInternalLabelsToEdges && !resolved.suppressInternalNodeTaxa) {
    throw new ConfigError(
      'assignInternalLabelsToEdges requires suppressInternalNodeTaxa (internal labels cannot be both taxa and edge labels)'
    );
  }
  return resolved;
}
