/**
 * Data Model
 */

export {
  findAnnotation,
  type Annotated,
  type Annotation,
  type AnnotationValue,
} from './annotation.js';
export {
  Taxon,
  TaxonNamespace,
  type TaxonNamespaceFactory,
  type TaxonNamespaceOptions,
} from './taxon.js';
export {
  Edge,
  Node,
  Tree,
  type NodeOptions,
  type TreeFactory,
  type TreeOptions,
} from './tree.js';
