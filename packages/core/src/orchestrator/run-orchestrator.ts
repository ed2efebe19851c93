import * as path from 'node:path';
import type {
  DailyDocument,
  Diagnostic,
  ImageReference,
  IsoDate,
  NoteTopicsConfig,
  ProcessResult,
  Section,
  TopicBuffer,
} from '@note-topics/types';
import { DEFAULT_CONFIG, createDiagnostic } from '@note-topics/types';
import { SectionSplitter, hasMixedLineEndings, type Splitter } from '../splitter/index.js';
import { ImageResolver } from '../images/image-resolver.js';
import { TopicAccumulator } from '../accumulator/topic-accumulator.js';
import { OutputWriter } from '../writer/output-writer.js';
import { ArchiveMover, type FileOps } from '../archive/archive-mover.js';
import { DailyDiscovery } from '../discovery/daily-discovery.js';
import { toError } from '../utils/errors.js';

export type RunState =
  | 'discover'
  | 'parse'
  | 'fold'
  | 'flush'
  | 'archive'
  | 'done'
  | 'failed-partial';

export interface RunOrchestratorOptions {
  /** 入力ディレクトリ（日次ファイルと画像のルート） */
  inputDir: string;
  /** 出力ディレクトリ */
  outputDir: string;
  config?: NoteTopicsConfig;
  /** 進捗ログを出さない */
  quiet?: boolean;
  /** 退避に使うファイル操作（テスト用） */
  fileOps?: FileOps;
}

interface ParsedDocument {
  document: DailyDocument;
  sections: Section[];
  images: ImageReference[];
}

/**
 * 1回の実行を取りまとめるクラス
 *
 * 状態: discover → parse → fold → flush → archive → done | failed-partial
 *
 * - parseはドキュメントごとに並行
 * - fold/flush/archiveは日付順に直列
 */
export class RunOrchestrator {
  private inputDir: string;
  private outputDir: string;
  private config: NoteTopicsConfig;
  private quiet: boolean;
  private state: RunState = 'discover';

  private splitter: Splitter;
  private resolver: ImageResolver;
  private writer: OutputWriter;
  private archiver: ArchiveMover;

  constructor(options: RunOrchestratorOptions) {
    this.inputDir = path.resolve(options.inputDir);
    this.outputDir = path.resolve(options.outputDir);
    this.config = options.config ?? DEFAULT_CONFIG;
    this.quiet = options.quiet ?? false;

    this.splitter = new SectionSplitter({
      introductionLabel: this.config.sections.introductionLabel,
    });
    this.resolver = new ImageResolver({
      inputDir: this.inputDir,
      extensions: this.config.images.extensions,
    });
    this.writer = new OutputWriter({
      outputDir: this.outputDir,
      sections: this.config.sections,
    });
    this.archiver = new ArchiveMover({
      inputDir: this.inputDir,
      outputDir: this.outputDir,
      archiveDir: this.config.directories.archive,
      ops: options.fileOps,
    });
  }

  /**
   * 現在の状態
   */
  getState(): RunState {
    return this.state;
  }

  /**
   * 入力ディレクトリから日次ドキュメントを探して処理
   */
  async run(): Promise<ProcessResult> {
    this.state = 'discover';
    this.log(`Processing daily notes from ${this.inputDir}`);
    this.log(`Output will be saved to ${this.outputDir}`);

    const discovery = new DailyDiscovery({
      inputDir: this.inputDir,
      extension: this.config.files.extension,
    });
    const { documents, diagnostics } = await discovery.findDocuments();
    this.log(`Found ${documents.length} daily note files`);

    return this.process(documents, diagnostics);
  }

  /**
   * 日次ドキュメントを処理
   * @param documents 処理対象（順不同でよい。日付の昇順に並べ替える）
   * @param initialDiagnostics 呼び出し側で集めた診断（結果に含める）
   */
  async process(
    documents: DailyDocument[],
    initialDiagnostics: Diagnostic[] = []
  ): Promise<ProcessResult> {
    const diagnostics: Diagnostic[] = [...initialDiagnostics];
    const result: ProcessResult = {
      status: 'done',
      topicsWritten: [],
      archived: [],
      copiedImages: [],
      diagnostics,
    };

    // 日付順に並べ、同じ日付は最初の1件だけを処理
    const ordered = [...documents].sort(
      (a, b) => a.date.localeCompare(b.date) || a.path.localeCompare(b.path)
    );
    const accepted: DailyDocument[] = [];
    const seen = new Map<string, string>();
    for (const document of ordered) {
      const previous = seen.get(document.date);
      if (previous) {
        diagnostics.push(
          createDiagnostic('DuplicateDate', document.path, `${document.date} is already provided by ${previous}`)
        );
        continue;
      }
      seen.set(document.date, document.path);
      accepted.push(document);
    }

    // parse（並行）
    this.state = 'parse';
    const parsedResults = await Promise.all(
      accepted.map((document) => this.parseDocument(document))
    );
    const parsed: ParsedDocument[] = [];
    for (const parseResult of parsedResults) {
      diagnostics.push(...parseResult.diagnostics);
      if (parseResult.parsed) {
        parsed.push(parseResult.parsed);
      }
    }

    // fold（直列・日付順）
    this.state = 'fold';
    const accumulator = new TopicAccumulator({ extension: this.config.files.extension });
    const labelsByDocument = new Map<DailyDocument, Set<string>>();
    for (const { document, sections } of parsed) {
      const labels = new Set<string>();
      for (const section of sections) {
        if (accumulator.fold(document.date, section)) {
          labels.add(section.label);
        }
      }
      labelsByDocument.set(document, labels);
    }

    // flush
    // 書き込み前に各ファイルの最後の日付を読んでおく。
    // 大文字小文字を区別しないファイルシステムでは別のバッファが同じファイルに書くことがある
    this.state = 'flush';
    const buffers = accumulator.buffers();
    const failedFiles = new Set<string>();
    const persistedDates = new Map<TopicBuffer, IsoDate | null>();
    for (const buffer of buffers) {
      try {
        persistedDates.set(buffer, await this.writer.lastPersistedDate(buffer.fileName));
      } catch (error) {
        this.recordWriteFailure(buffer, this.writer.pathFor(buffer.fileName), toError(error), diagnostics);
        failedFiles.add(buffer.fileName);
      }
    }

    const documentsByDate = new Map(
      parsed.map(({ document }): [IsoDate, DailyDocument] => [document.date, document])
    );
    const skippedByDocument = new Map<DailyDocument, Array<{ path: string; date: IsoDate }>>();
    for (const buffer of buffers) {
      const since = persistedDates.get(buffer);
      if (since === undefined) {
        continue;
      }
      const outcome = await this.writer.flush(buffer, since);

      if (outcome.kind === 'failed') {
        this.recordWriteFailure(buffer, outcome.path, outcome.error, diagnostics);
        failedFiles.add(buffer.fileName);
        continue;
      }

      for (const entry of outcome.skipped) {
        const document = documentsByDate.get(entry.date);
        if (document) {
          const skipped = skippedByDocument.get(document) ?? [];
          skipped.push({ path: outcome.path, date: entry.date });
          skippedByDocument.set(document, skipped);
        }
      }

      if (outcome.kind === 'created' || outcome.kind === 'appended') {
        result.topicsWritten.push(...buffer.labels);
        this.log(
          `${outcome.kind === 'created' ? 'Created' : 'Appended to'} ${path.basename(outcome.path)} (${outcome.written.length} days)`
        );
      }
    }

    // archive
    this.state = 'archive';
    const copiedSources = new Set<string>();
    for (const { document, images } of parsed) {
      for (const image of images) {
        if (copiedSources.has(image.sourcePath)) {
          continue;
        }
        copiedSources.add(image.sourcePath);

        const copy = await this.archiver.copyImage(image);
        if (copy.kind === 'copied') {
          result.copiedImages.push(copy.destination);
        } else {
          diagnostics.push(createDiagnostic('ImageCopyFailed', image.sourcePath, copy.error.message));
        }
      }

      const skipped = skippedByDocument.get(document) ?? [];
      const blocking = [...(labelsByDocument.get(document) ?? [])].filter((label) =>
        failedFiles.has(accumulator.fileNameFor(label))
      );
      if (blocking.length > 0) {
        diagnostics.push(...alreadyPersisted(skipped, document.path));
        diagnostics.push(
          createDiagnostic(
            'NotArchived',
            document.path,
            `kept in place because ${blocking.join(', ')} could not be written`
          )
        );
        continue;
      }

      const { destination, outcome } = await this.archiver.archiveDocument(document);
      switch (outcome.kind) {
        case 'relocated':
          diagnostics.push(...alreadyPersisted(skipped, destination));
          result.archived.push(document.path);
          this.log(`Moved ${path.basename(document.path)} to ${path.dirname(destination)}`);
          break;
        case 'copied-not-deleted':
          diagnostics.push(...alreadyPersisted(skipped, document.path));
          diagnostics.push(
            createDiagnostic(
              'NotArchived',
              document.path,
              `copied to ${destination} but the original could not be deleted: ${outcome.error.message}`
            )
          );
          break;
        case 'failed':
          diagnostics.push(...alreadyPersisted(skipped, document.path));
          diagnostics.push(createDiagnostic('MoveFailed', document.path, outcome.error.message));
          break;
      }
    }

    if (copiedSources.size === 0) {
      this.log('No image files found to copy');
    } else {
      this.log(`Copied ${result.copiedImages.length} image files`);
    }

    result.status = diagnostics.some((d) => d.severity === 'error') ? 'failed-partial' : 'done';
    this.state = result.status;
    return result;
  }

  /**
   * 1ドキュメントを分割し、画像参照を解決
   */
  private async parseDocument(
    document: DailyDocument
  ): Promise<{ parsed: ParsedDocument | null; diagnostics: Diagnostic[] }> {
    const diagnostics: Diagnostic[] = [];
    this.log(`Processing ${path.basename(document.path)}`);

    try {
      if (hasMixedLineEndings(document.rawText)) {
        diagnostics.push(
          createDiagnostic('ParseDegraded', document.path, 'mixed line endings were normalized')
        );
      }

      const sections = [...this.splitter.split(document.rawText)];
      const images: ImageReference[] = [];
      const seen = new Set<string>();

      for (const section of sections) {
        if (!section.body) {
          continue;
        }
        const { references, unresolved } = await this.resolver.resolve(section.body);

        for (const target of unresolved) {
          diagnostics.push(
            createDiagnostic(
              'UnresolvableImage',
              document.path,
              `image "${target}" was not found under ${this.inputDir}`
            )
          );
        }
        for (const reference of references) {
          if (!seen.has(reference.sourcePath)) {
            seen.add(reference.sourcePath);
            images.push(reference);
          }
        }
      }

      return { parsed: { document, sections, images }, diagnostics };
    } catch (error) {
      diagnostics.push(createDiagnostic('ParseFailed', document.path, toError(error).message));
      return { parsed: null, diagnostics };
    }
  }

  private recordWriteFailure(
    buffer: TopicBuffer,
    filePath: string,
    error: Error,
    diagnostics: Diagnostic[]
  ): void {
    diagnostics.push(createDiagnostic('WriteFailed', filePath, error.message));
    console.error(`[RunOrchestrator] Failed to write ${buffer.labels.join(', ')} to ${filePath}:`, error.message);
  }

  private log(message: string): void {
    if (!this.quiet) {
      console.log(`[RunOrchestrator] ${message}`);
    }
  }
}

/**
 * 書き込まなかった寄与の診断
 * @param location その内容が残っている場所
 */
function alreadyPersisted(skipped: Array<{ path: string; date: IsoDate }>, location: string): Diagnostic[] {
  return skipped.map(({ path: filePath, date }) =>
    createDiagnostic(
      'AlreadyPersisted',
      filePath,
      `${date} is not later than the last date already in the file; the section was not written and remains only in ${location}`
    )
  );
}
