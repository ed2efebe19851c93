/**
 * @note-topics/types
 * note-topicsの共通型定義
 */

// Document
export type { DailyDocument, IsoDate } from './document.js';

// Section
export type { Section, ImageReference, ImageSyntax } from './section.js';

// Topic
export type { TopicBuffer, TopicEntry } from './topic.js';

// Diagnostics
export type {
  Diagnostic,
  DiagnosticKind,
  DiagnosticSeverity,
  ProcessResult,
  RunStatus,
} from './diagnostics.js';
export { DIAGNOSTIC_SEVERITY, createDiagnostic } from './diagnostics.js';

// Config
export type {
  NoteTopicsConfig,
  DirectoriesConfig,
  FilesConfig,
  ImagesConfig,
  SectionsConfig,
} from './config.js';
export { DEFAULT_CONFIG } from './config.js';
