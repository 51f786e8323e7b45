export {
  escapeNexusToken,
  formatAnnotationsAsComment,
  writeNewick,
  type EscapeOptions,
  type NewickWriterOptions,
} from './newick-writer.js';
