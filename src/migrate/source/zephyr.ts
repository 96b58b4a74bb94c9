/**
 * Zephyr Scale Source Adapter
 *
 * Reads folders, test cases, test cycles and executions page by page from
 * the Zephyr Scale Cloud REST API (v2), plus attachment metadata and content.
 */

import type { SourceConfig } from '../../config.js';
import { silentLogger, type Logger } from '../../logger.js';
import { MalformedResponseError } from '../errors.js';
import { ApiClient, type ClientRuntime, type PageAdapter } from '../http/api-client.js';
import { StaticTokenProvider } from '../http/auth.js';
import { isRecord, readId, type JsonRecord } from '../json.js';
import type {
  AttachmentDescriptor,
  AttachmentOwner,
  EntityReference,
  EntityType,
  SourceAdapter,
  SourcePage,
  StagedItem,
} from '../types.js';
import { ZephyrAttachmentSchema, ZephyrItemSchema, ZephyrPageSchema } from './zephyr-schemas.js';

export type ListableType = Exclude<EntityType, 'attachment'>;

const LIST_ENDPOINTS: Record<ListableType, string> = {
  folder: '/folders',
  testCase: '/testcases',
  testCycle: '/testcycles',
  testExecution: '/testexecutions',
};

// ─── Pagination ──────────────────────────────────────────────

/**
 * Offset pagination: `startAt` / `maxResults` in, `values` / `isLast` out.
 * The cursor is the next `startAt` as a decimal string.
 */
export function zephyrPageAdapter(pageSize: number): PageAdapter<unknown> {
  return {
    query: (cursor) => ({ startAt: cursor ? Number(cursor) : 0, maxResults: pageSize }),
    parse: (body, cursor) => {
      if (Array.isArray(body)) {
        return { items: body, nextCursor: null };
      }
      const page = ZephyrPageSchema.safeParse(body);
      if (!page.success) {
        throw new MalformedResponseError(`Unexpected page shape: ${page.error.issues[0]?.message ?? 'unknown'}`);
      }

      const { values } = page.data;
      const startAt = page.data.startAt ?? (cursor ? Number(cursor) : 0);
      const next = startAt + values.length;
      const isLast =
        page.data.isLast ?? (page.data.total !== undefined ? next >= page.data.total : values.length < pageSize);

      return { items: values, nextCursor: isLast || values.length === 0 ? null : String(next) };
    },
  };
}

// ─── References ──────────────────────────────────────────────

/** ID from a bare value or an `{ id }` link object. */
function refId(value: unknown): string | undefined {
  if (isRecord(value)) return readId(value.id);
  return readId(value);
}

/**
 * Relationships of a raw item, by source ID.
 */
export function deriveReferences(type: ListableType, item: JsonRecord): EntityReference[] {
  const refs: EntityReference[] = [];
  const add = (role: string, entityType: EntityType, sourceId: string | undefined): void => {
    if (sourceId !== undefined) refs.push({ role, entityType, sourceId });
  };

  switch (type) {
    case 'folder':
      add('parent', 'folder', readId(item.parentId));
      break;
    case 'testCase':
    case 'testCycle':
      add('folder', 'folder', readId(item.folderId) ?? refId(item.folder));
      break;
    case 'testExecution':
      add('testCase', 'testCase', readId(item.testCaseId) ?? refId(item.testCase));
      add('testCycle', 'testCycle', readId(item.testCycleId) ?? readId(item.cycleId) ?? refId(item.testCycle));
      break;
  }
  return refs;
}

// ─── Adapter ─────────────────────────────────────────────────

export interface ZephyrSourceOptions {
  client: ApiClient;
  projectKey: string;
  pageSize: number;
  logger?: Logger;
}

export class ZephyrSource implements SourceAdapter {
  readonly platform = 'zephyr';
  private readonly client: ApiClient;
  private readonly projectKey: string;
  private readonly pages: PageAdapter<unknown>;
  private readonly logger: Logger;

  constructor(options: ZephyrSourceOptions) {
    this.client = options.client;
    this.projectKey = options.projectKey;
    this.pages = zephyrPageAdapter(options.pageSize);
    this.logger = options.logger ?? silentLogger;
  }

  async fetchPage(entityType: ListableType, cursor: string | null): Promise<SourcePage> {
    const path = LIST_ENDPOINTS[entityType];
    const page = await this.client.fetchPage(path, cursor, this.pages, {
      query: { projectKey: this.projectKey },
    });

    const items: StagedItem[] = [];
    for (const raw of page.items) {
      const parsed = ZephyrItemSchema.safeParse(raw);
      if (!parsed.success || !isRecord(raw)) {
        this.logger.warn(`Skipping ${entityType} without an id on page at ${cursor ?? 0}`);
        continue;
      }
      items.push({
        sourceId: parsed.data.id,
        payload: raw,
        references: deriveReferences(entityType, raw),
      });
    }

    return { items, nextCursor: page.nextCursor };
  }

  async listAttachments(owner: AttachmentOwner): Promise<AttachmentDescriptor[]> {
    const base = owner.entityType === 'testCase' ? '/testcases' : '/testexecutions';
    const body = await this.client.request('GET', `${base}/${encodeURIComponent(owner.key)}/attachments`, {
      endpointKey: `${base}/{key}/attachments`,
    });

    const values: unknown[] = Array.isArray(body) ? body : isRecord(body) && Array.isArray(body.values) ? body.values : [];
    const attachments: AttachmentDescriptor[] = [];
    for (const raw of values) {
      const parsed = ZephyrAttachmentSchema.safeParse(raw);
      if (!parsed.success) {
        this.logger.warn(`Skipping malformed attachment of ${owner.entityType} ${owner.sourceId}`);
        continue;
      }
      const a = parsed.data;
      attachments.push({
        id: a.id,
        filename: a.filename ?? a.name ?? `attachment-${a.id}`,
        contentType: a.contentType ?? a.mimeType ?? 'application/octet-stream',
        size: a.fileSize ?? a.size ?? undefined,
      });
    }
    return attachments;
  }

  async downloadAttachment(attachmentId: string, filePath: string): Promise<number> {
    return this.client.download(`/attachments/${encodeURIComponent(attachmentId)}/content`, filePath, {
      endpointKey: '/attachments/{id}/content',
    });
  }
}

/**
 * Build the source adapter and its client from configuration.
 */
export function createZephyrSource(config: SourceConfig, runtime: ClientRuntime = {}): ZephyrSource {
  const client = new ApiClient({
    name: 'zephyr',
    baseUrl: config.baseUrl,
    tokenProvider: new StaticTokenProvider(config.token),
    rateLimit: config.rateLimit,
    retry: config.retry,
    circuitBreaker: config.circuitBreaker,
    timeoutMs: config.timeoutMs,
    ...runtime,
  });
  return new ZephyrSource({
    client,
    projectKey: config.projectKey,
    pageSize: config.pageSize,
    logger: runtime.logger?.child('zephyr'),
  });
}
