/**
 * One normalization pass: materialize, rewrite links, write the digest,
 * save the mapping. Passes never overlap.
 */

import { MappingStore } from './mapping-store.js';
import { TreeMaterializer } from './tree-materializer.js';
import { LinkRewriter } from './link-rewriter.js';
import { CombinedWriter } from './combined-writer.js';
import { logger } from './logger.js';
import type { AppConfig } from './config.js';
import type { PassSummary } from './types.js';

const LOG_CONTEXT = 'Pipeline';

export interface PassRunner {
  runPass(reason: string): Promise<PassSummary>;
  idle(): Promise<void>;
}

export class NormalizationPipeline implements PassRunner {
  readonly store: MappingStore;
  private materializer: TreeMaterializer;
  private rewriter: LinkRewriter;
  private combined: CombinedWriter | null;

  private running: Promise<PassSummary> | null = null;
  private queued: Promise<PassSummary> | null = null;
  private passCount = 0;

  constructor(config: AppConfig, store?: MappingStore) {
    const { paths, naming, combined } = config;

    this.store = store ?? new MappingStore(paths.mappingFile);
    this.materializer = new TreeMaterializer(this.store, {
      inputRoot: paths.inputRoot,
      outputRoot: paths.outputRoot,
      naming,
      ignoreNames: naming.ignoreNames,
      markdownExtensions: naming.markdownExtensions,
    });
    this.rewriter = new LinkRewriter(this.store, { outputRoot: paths.outputRoot });
    this.combined = combined.enabled
      ? new CombinedWriter({
          outputRoot: paths.outputRoot,
          combinedPath: combined.path,
          markdownExtensions: naming.markdownExtensions,
        })
      : null;
  }

  /**
   * Restore the mapping saved by an earlier run.
   */
  load(): number {
    return this.store.load();
  }

  get completedPasses(): number {
    return this.passCount;
  }

  /**
   * Run a pass now, or after the one in flight. Calls that arrive while a
   * pass runs share a single follow-up pass.
   */
  runPass(reason: string = 'manual'): Promise<PassSummary> {
    if (this.queued) return this.queued;

    if (this.running) {
      const next = (): Promise<PassSummary> => {
        this.queued = null;
        return this.runPass(reason);
      };
      this.queued = this.running.then(next, next);
      return this.queued;
    }

    this.running = this.execute(reason).finally(() => {
      this.running = null;
    });
    return this.running;
  }

  /**
   * Resolves once no pass is running or waiting.
   */
  async idle(): Promise<void> {
    for (let pending = this.queued ?? this.running; pending; pending = this.queued ?? this.running) {
      await Promise.allSettled([pending]);
    }
  }

  private async execute(reason: string): Promise<PassSummary> {
    const started = Date.now();
    const pass = this.passCount + 1;
    logger.info(`Pass ${pass} started (${reason})`, undefined, LOG_CONTEXT);

    const { summary: materialize, documents } = await this.materializer.processAll();
    const rewrite = await this.rewriter.processLinks(documents);
    const combinedWritten = this.combined ? await this.combined.write() : false;
    const mappingPersisted = this.store.persist();

    this.passCount = pass;
    const summary: PassSummary = {
      reason,
      materialize,
      rewrite,
      combinedWritten,
      mappingPersisted,
      durationMs: Date.now() - started,
    };

    logger.info(
      `Pass ${pass} finished in ${summary.durationMs}ms`,
      {
        written: materialize.written + rewrite.filesChanged,
        unchanged: materialize.unchanged + rewrite.unchanged,
        failed: materialize.failed + rewrite.failed,
        linksRewritten: rewrite.linksRewritten,
        unresolved: rewrite.unresolved,
      },
      LOG_CONTEXT
    );

    return summary;
  }
}
