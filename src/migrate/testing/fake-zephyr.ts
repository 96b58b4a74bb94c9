/**
 * Fake Zephyr Scale API: paginated listings, attachment metadata and content.
 */

import type { JsonRecord } from '../json.js';
import { FakeApi, json, notFound, type RecordedRequest } from './fake-api.js';

export interface FakeAttachment {
  id: string | number;
  filename: string;
  contentType?: string;
  content: string;
}

const COLLECTIONS = ['folders', 'testcases', 'testcycles', 'testexecutions'] as const;

type Collection = (typeof COLLECTIONS)[number];

function isCollection(value: string): value is Collection {
  return COLLECTIONS.some((name) => name === value);
}

export class FakeZephyr extends FakeApi {
  readonly folders: JsonRecord[] = [];
  readonly testCases: JsonRecord[] = [];
  readonly testCycles: JsonRecord[] = [];
  readonly testExecutions: JsonRecord[] = [];
  /** Attachments by owner path, e.g. "testcases/PRJ-T1" */
  readonly attachments = new Map<string, FakeAttachment[]>();

  addAttachment(owner: 'testcases' | 'testexecutions', key: string, attachment: FakeAttachment): void {
    const path = `${owner}/${key}`;
    this.attachments.set(path, [...(this.attachments.get(path) ?? []), attachment]);
  }

  protected handle(request: RecordedRequest): Response {
    if (request.method !== 'GET') return notFound(request);
    const segments = request.path.split('/').filter(Boolean).map(decodeURIComponent);

    if (segments.length === 1 && isCollection(segments[0])) {
      return this.list(this.collection(segments[0]), request);
    }

    if (segments.length === 3 && (segments[0] === 'testcases' || segments[0] === 'testexecutions') && segments[2] === 'attachments') {
      const attachments = this.attachments.get(`${segments[0]}/${segments[1]}`) ?? [];
      return json(
        200,
        attachments.map(({ id, filename, contentType }) => ({ id, filename, contentType })),
      );
    }

    if (segments.length === 3 && segments[0] === 'attachments' && segments[2] === 'content') {
      for (const attachments of this.attachments.values()) {
        const found = attachments.find((a) => String(a.id) === segments[1]);
        if (found) {
          return new Response(found.content, {
            status: 200,
            headers: { 'Content-Type': found.contentType ?? 'application/octet-stream' },
          });
        }
      }
    }

    return notFound(request);
  }

  private collection(name: Collection): JsonRecord[] {
    switch (name) {
      case 'folders':
        return this.folders;
      case 'testcases':
        return this.testCases;
      case 'testcycles':
        return this.testCycles;
      case 'testexecutions':
        return this.testExecutions;
    }
  }

  private list(items: JsonRecord[], request: RecordedRequest): Response {
    const startAt = Number(request.query.startAt ?? 0);
    const maxResults = Number(request.query.maxResults ?? 50);
    const values = items.slice(startAt, startAt + maxResults);
    return json(200, {
      startAt,
      maxResults,
      total: items.length,
      isLast: startAt + values.length >= items.length,
      values,
    });
  }
}
