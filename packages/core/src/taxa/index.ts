export {
  TaxonSymbolResolver,
  withTaxonSymbolResolver,
  type SymbolResolver,
  type TaxonSymbolResolverOptions,
} from './resolver.js';
