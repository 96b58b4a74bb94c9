/**
 * Extraction Service
 *
 * Pulls one entity type from the source into the staging store. Each page
 * is staged together with its checkpoint, so an interrupted extraction
 * resumes from the next unfetched page.
 */

import { silentLogger, type Logger } from '../../logger.js';
import { MalformedResponseError, errorCode, errorMessage, isFatal } from '../errors.js';
import { readId } from '../json.js';
import { attachmentPath } from '../staging/attachment-files.js';
import type { StagingStore } from '../staging/store.js';
import type { AttachmentOwner, EntityType, SourceAdapter, SourceEntity, StagedItem } from '../types.js';

export type ExtractOutcome = 'extracted' | 'failed' | 'cancelled';

export interface ExtractResult {
  entityType: EntityType;
  outcome: ExtractOutcome;
  /** Items newly staged by this call */
  staged: number;
  error?: string;
}

/** An attachment whose content could not be downloaded. */
interface DownloadFailure {
  sourceId: string;
  code: string;
  reason: string;
}

type Downloaded =
  | { payload: Record<string, unknown> }
  | { payload: Record<string, unknown>; failure: DownloadFailure };

export interface ExtractProgress {
  entityType: EntityType;
  pagesFetched: number;
  itemsStaged: number;
}

export interface ExtractionServiceOptions {
  store: StagingStore;
  source: SourceAdapter;
  attachmentsDir: string;
  logger?: Logger;
  onProgress?: (progress: ExtractProgress) => void;
}

export class ExtractionService {
  private readonly store: StagingStore;
  private readonly source: SourceAdapter;
  private readonly attachmentsDir: string;
  private readonly logger: Logger;
  private readonly onProgress?: (progress: ExtractProgress) => void;

  constructor(options: ExtractionServiceOptions) {
    this.store = options.store;
    this.source = options.source;
    this.attachmentsDir = options.attachmentsDir;
    this.logger = (options.logger ?? silentLogger).child('extract');
    this.onProgress = options.onProgress;
  }

  /**
   * Extract one entity type, resuming from its checkpoint.
   *
   * A failure that is not fatal to the run marks the type `failed` and is
   * reported in the result. Authentication and configuration errors propagate.
   */
  async extractType(runId: string, type: EntityType, signal?: AbortSignal): Promise<ExtractResult> {
    const checkpoint = this.store.getCheckpoint(runId, type);
    if (!this.needsExtraction(runId, type)) {
      return { entityType: type, outcome: 'extracted', staged: 0 };
    }

    this.store.updateCheckpoint(runId, type, { status: 'extracting', error: null });
    this.logger.debug(`${type}: starting at cursor ${checkpoint.extractCursor ?? '(first page)'}`);

    try {
      let staged = 0;
      if (type !== 'attachment') {
        staged = await this.extractPages(runId, type, signal);
      } else if (checkpoint.extractDone) {
        await this.retryDownloads(runId, signal);
      } else {
        staged = await this.extractAttachments(runId, signal);
      }

      const done = this.store.getCheckpoint(runId, type).extractDone;
      if (!done) {
        return { entityType: type, outcome: 'cancelled', staged };
      }
      this.logger.info(`${type}: staged ${staged} new item(s)`);
      return { entityType: type, outcome: 'extracted', staged };
    } catch (err) {
      if (isFatal(err)) {
        throw err;
      }
      const reason = errorMessage(err);
      this.store.updateCheckpoint(runId, type, { status: 'failed', error: reason });
      this.logger.error(`${type}: extraction failed: ${reason}`);
      return { entityType: type, outcome: 'failed', staged: 0, error: reason };
    }
  }

  /**
   * Whether the type still has pages to fetch, or staged attachments whose
   * content is missing after an earlier download failure.
   */
  needsExtraction(runId: string, type: EntityType): boolean {
    if (!this.store.getCheckpoint(runId, type).extractDone) return true;
    return type === 'attachment' && this.missingDownloads(runId).length > 0;
  }

  private async extractPages(
    runId: string,
    type: Exclude<EntityType, 'attachment'>,
    signal?: AbortSignal,
  ): Promise<number> {
    let cursor = this.store.getCheckpoint(runId, type).extractCursor;
    let staged = 0;

    while (!signal?.aborted) {
      const page = await this.source.fetchPage(type, cursor);
      if (page.nextCursor !== null && page.nextCursor === cursor) {
        throw new MalformedResponseError(`${type}: pagination did not advance past cursor ${cursor}`);
      }

      const done = page.nextCursor === null;
      staged += this.store.stagePage(runId, type, page.items, { cursor: page.nextCursor, done });
      this.reportProgress(runId, type);

      if (done) break;
      cursor = page.nextCursor;
    }

    return staged;
  }

  /**
   * Walk attachment owners (test cases, then executions, in staging order)
   * from the owner index saved in the checkpoint cursor.
   */
  private async extractAttachments(runId: string, signal?: AbortSignal): Promise<number> {
    const owners = [
      ...this.store.listEntities(runId, 'testCase'),
      ...this.store.listEntities(runId, 'testExecution'),
    ];
    const start = Number(this.store.getCheckpoint(runId, 'attachment').extractCursor ?? 0);

    if (start >= owners.length) {
      this.store.stagePage(runId, 'attachment', [], { cursor: String(owners.length), done: true });
      return 0;
    }

    let staged = 0;
    for (let index = start; index < owners.length; index++) {
      if (signal?.aborted) break;

      const owner = toOwner(owners[index]);
      const { items, failures } = await this.downloadOwnerAttachments(runId, owner);
      staged += this.store.transaction(() => {
        const inserted = this.store.stagePage(runId, 'attachment', items, {
          cursor: String(index + 1),
          done: index + 1 === owners.length,
        });
        for (const failure of failures) {
          this.store.markFailed(runId, 'attachment', failure.sourceId, failure.code, failure.reason);
        }
        return inserted;
      });
      this.reportProgress(runId, 'attachment');
    }

    return staged;
  }

  /**
   * Download every attachment of one owner. A download that fails without
   * being fatal is staged without content and reported as a failure, so the
   * remaining attachments still go through.
   */
  private async downloadOwnerAttachments(
    runId: string,
    owner: AttachmentOwner,
  ): Promise<{ items: StagedItem[]; failures: DownloadFailure[] }> {
    const attachments = await this.source.listAttachments(owner);
    const items: StagedItem[] = [];
    const failures: DownloadFailure[] = [];

    for (const attachment of attachments) {
      const payload: Record<string, unknown> = {
        id: attachment.id,
        filename: attachment.filename,
        contentType: attachment.contentType,
        ownerType: owner.entityType,
        ownerId: owner.sourceId,
      };
      const downloaded = await this.download(runId, payload, attachment.id, attachment.filename);
      if ('failure' in downloaded) {
        failures.push(downloaded.failure);
      }
      items.push({
        sourceId: attachment.id,
        payload: downloaded.payload,
        references: [{ role: 'owner', entityType: owner.entityType, sourceId: owner.sourceId }],
      });
    }

    return { items, failures };
  }

  /**
   * Download again the content of attachments restaged after a failure.
   */
  private async retryDownloads(runId: string, signal?: AbortSignal): Promise<void> {
    let recovered = 0;
    for (const entity of this.missingDownloads(runId)) {
      if (signal?.aborted) return;

      const base = { ...entity.payload };
      delete base.downloadError;
      const filename = typeof base.filename === 'string' ? base.filename : entity.sourceId;
      const downloaded = await this.download(runId, base, entity.sourceId, filename);
      this.store.transaction(() => {
        this.store.updatePayload(runId, 'attachment', entity.sourceId, downloaded.payload);
        if ('failure' in downloaded) {
          const { code, reason } = downloaded.failure;
          this.store.markFailed(runId, 'attachment', entity.sourceId, code, reason);
        }
      });
      if (!('failure' in downloaded)) recovered++;
    }
    this.logger.info(`attachment: downloaded ${recovered} attachment(s) that failed before`);
  }

  private async download(
    runId: string,
    base: Record<string, unknown>,
    attachmentId: string,
    filename: string,
  ): Promise<Downloaded> {
    const localPath = attachmentPath(this.attachmentsDir, runId, attachmentId, filename);
    try {
      const size = await this.source.downloadAttachment(attachmentId, localPath);
      return { payload: { ...base, size, localPath } };
    } catch (err) {
      if (isFatal(err)) {
        throw err;
      }
      const reason = `Attachment ${attachmentId} could not be downloaded: ${errorMessage(err)}`;
      this.logger.warn(reason);
      return {
        payload: { ...base, downloadError: reason },
        failure: { sourceId: attachmentId, code: errorCode(err), reason },
      };
    }
  }

  /** Staged attachments that carry a download error instead of a local file. */
  private missingDownloads(runId: string): SourceEntity[] {
    return this.store
      .listEntities(runId, 'attachment', 'staged')
      .filter((entity) => typeof entity.payload.downloadError === 'string');
  }

  private reportProgress(runId: string, type: EntityType): void {
    const checkpoint = this.store.getCheckpoint(runId, type);
    this.onProgress?.({
      entityType: type,
      pagesFetched: checkpoint.pagesFetched,
      itemsStaged: checkpoint.itemsStaged,
    });
  }
}

function toOwner(entity: SourceEntity): AttachmentOwner {
  const entityType = entity.entityType === 'testCase' ? 'testCase' : 'testExecution';
  return {
    entityType,
    sourceId: entity.sourceId,
    key: readId(entity.payload.key) ?? entity.sourceId,
  };
}
