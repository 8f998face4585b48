export type { Source, CitationEntry, MergeableField } from './types.js';
export { MERGEABLE_FIELDS } from './types.js';
export { CitationManager, formatCitation, type CitationManagerOptions } from './manager.js';
