/**
 * Export module
 * Markdown rendering and citation resolution
 */

export {
  fence,
  jsonBlock,
  renderContent,
  renderMessage,
  formatReference,
  assembleDocument,
  toMarkdown,
  type MarkdownOptions,
  type Section,
} from './markdown.js';

export {
  ReferenceRegistry,
  resolveCitations,
  citationIdentity,
  type ReferenceEntry,
} from './citations.js';
