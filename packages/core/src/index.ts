/**
 * @note-topics/core
 *
 * 日次ノートをトピックごとに集約するエンジン
 */

export { RunOrchestrator, type RunOrchestratorOptions, type RunState } from './orchestrator/run-orchestrator.js';
export { ConfigLoader, CONFIG_FILE_NAMES, type ResolveConfigOptions } from './config/loader.js';
export { validateConfig, type PartialConfig } from './config/validator.js';
export {
  DailyDiscovery,
  parseDailyFileName,
  DEFAULT_MAX_CONCURRENT_READS,
  type DailyDiscoveryOptions,
  type DiscoveryResult,
  type ParsedDailyName,
} from './discovery/daily-discovery.js';
export { SectionSplitter, hasMixedLineEndings, parseHeadingLabel, type Splitter } from './splitter/index.js';
export { ImageResolver, type ImageResolution, type RawImageReference } from './images/image-resolver.js';
export { TopicAccumulator } from './accumulator/topic-accumulator.js';
export { OutputWriter, formatEntry, type WriteOutcome } from './writer/output-writer.js';
export { toTopicFileName } from './writer/file-name.js';
export {
  ArchiveMover,
  relocate,
  nodeFileOps,
  type FileOps,
  type RelocateOutcome,
  type ImageCopyOutcome,
} from './archive/archive-mover.js';
