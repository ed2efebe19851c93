/**
 * Splitter interfaces and exports
 */

import type { Section } from '@note-topics/types';

/**
 * Splitter interface
 */
export interface Splitter {
  split(rawText: string): Iterable<Section>;
}

export {
  SectionSplitter,
  parseHeadingLabel,
  normalizeLineEndings,
  hasMixedLineEndings,
  type SectionSplitterOptions,
} from './section-splitter.js';
