/**
 * qTest Manager Destination Adapter
 *
 * Creates modules, test cases, test cycles, test runs (with their test log)
 * and attachments through the qTest REST API (v3), and deletes them again
 * when a batch is rolled back.
 */

import type { DestinationConfig } from '../../config.js';
import { silentLogger, type Logger } from '../../logger.js';
import { errorMessage } from '../errors.js';
import { ApiClient, type ClientRuntime } from '../http/api-client.js';
import { OAuthPasswordTokenProvider, StaticTokenProvider, type TokenProvider } from '../http/auth.js';
import type {
  DestinationAdapter,
  ModulePayload,
  TestCasePayload,
  TestCyclePayload,
  TestRunPayload,
  TransformedEntity,
  TransformedPayload,
} from '../types.js';

// ─── Request Bodies ──────────────────────────────────────────

/** qTest IDs are numeric; keep anything else as sent. */
function apiId(id: string): number | string {
  return /^\d+$/.test(id) ? Number(id) : id;
}

export function moduleBody(payload: ModulePayload): Record<string, unknown> {
  return {
    name: payload.name,
    description: payload.description,
    parent_id: payload.parentId !== undefined ? apiId(payload.parentId) : undefined,
  };
}

export function testCaseBody(payload: TestCasePayload): Record<string, unknown> {
  return {
    name: payload.name,
    description: payload.description,
    precondition: payload.precondition,
    parent_id: payload.parentId !== undefined ? apiId(payload.parentId) : undefined,
    properties: payload.properties,
    test_steps: payload.testSteps.map((step) => ({
      description: step.description,
      expected: step.expected,
      order: step.order,
    })),
  };
}

export function testCycleBody(payload: TestCyclePayload): Record<string, unknown> {
  return {
    name: payload.name,
    description: payload.description,
    parent_id: payload.parentId !== undefined ? apiId(payload.parentId) : undefined,
    planned_start_date: payload.plannedStartDate,
    planned_end_date: payload.plannedEndDate,
    properties: payload.properties,
  };
}

export function testRunBody(run: TestRunPayload['run']): Record<string, unknown> {
  return {
    name: run.name,
    test_case: { id: apiId(run.testCaseId) },
    properties: run.properties,
  };
}

export function testLogBody(log: TestRunPayload['log']): Record<string, unknown> {
  return {
    status: { name: log.status },
    exe_start_date: log.executionStartDate,
    exe_end_date: log.executionEndDate,
    note: log.note,
    test_step_logs: log.stepLogs.map((step) => ({
      order: step.order,
      status: { name: step.status },
      actual_result: step.actualResult,
    })),
  };
}

// ─── Adapter ─────────────────────────────────────────────────

export interface QTestDestinationOptions {
  client: ApiClient;
  projectId: string;
  logger?: Logger;
}

export class QTestDestination implements DestinationAdapter {
  readonly platform = 'qtest';
  private readonly client: ApiClient;
  private readonly base: string;
  private readonly logger: Logger;

  constructor(options: QTestDestinationOptions) {
    this.client = options.client;
    this.base = `/api/v3/projects/${encodeURIComponent(options.projectId)}`;
    this.logger = options.logger ?? silentLogger;
  }

  async create(entity: TransformedEntity): Promise<string> {
    switch (entity.entityType) {
      case 'folder':
        return this.client.submit(`${this.base}/modules`, moduleBody(entity.payload), {
          endpointKey: '/modules',
        });
      case 'testCase':
        return this.client.submit(`${this.base}/test-cases`, testCaseBody(entity.payload), {
          endpointKey: '/test-cases',
        });
      case 'testCycle':
        return this.client.submit(`${this.base}/test-cycles`, testCycleBody(entity.payload), {
          endpointKey: '/test-cycles',
        });
      case 'testExecution':
        return this.createTestRun(entity.payload);
      case 'attachment': {
        const { ownerType, ownerId, localPath, filename, contentType } = entity.payload;
        return this.client.upload(
          `${this.base}/${ownerType}/${encodeURIComponent(ownerId)}/blob-handles`,
          localPath,
          filename,
          contentType,
          { endpointKey: `/${ownerType}/{id}/blob-handles` },
        );
      }
    }
  }

  async remove(entity: TransformedPayload, destinationId: string): Promise<void> {
    const id = encodeURIComponent(destinationId);
    switch (entity.entityType) {
      case 'folder':
        return this.client.remove(`${this.base}/modules/${id}`, { endpointKey: '/modules/{id}' });
      case 'testCase':
        return this.client.remove(`${this.base}/test-cases/${id}`, { endpointKey: '/test-cases/{id}' });
      case 'testCycle':
        return this.client.remove(`${this.base}/test-cycles/${id}`, { endpointKey: '/test-cycles/{id}' });
      case 'testExecution':
        return this.client.remove(`${this.base}/test-runs/${id}`, { endpointKey: '/test-runs/{id}' });
      case 'attachment': {
        const { ownerType, ownerId } = entity.payload;
        return this.client.remove(`${this.base}/${ownerType}/${encodeURIComponent(ownerId)}/attachments/${id}`, {
          endpointKey: `/${ownerType}/{id}/attachments/{id}`,
        });
      }
    }
  }

  /**
   * A test run is only complete with its log. When the log cannot be
   * submitted the run is deleted before the error surfaces.
   */
  private async createTestRun(payload: TestRunPayload): Promise<string> {
    const runId = await this.client.submit(`${this.base}/test-runs`, testRunBody(payload.run), {
      query: { parentId: payload.run.testCycleId, parentType: 'test-cycle' },
      endpointKey: '/test-runs',
    });

    try {
      await this.client.submit(
        `${this.base}/test-runs/${encodeURIComponent(runId)}/test-logs`,
        testLogBody(payload.log),
        { endpointKey: '/test-runs/{id}/test-logs' },
      );
    } catch (err) {
      try {
        await this.client.remove(`${this.base}/test-runs/${encodeURIComponent(runId)}`, {
          endpointKey: '/test-runs/{id}',
        });
      } catch (cleanupErr) {
        this.logger.error(`Test run ${runId} left behind after its log failed: ${errorMessage(cleanupErr)}`);
      }
      throw err;
    }

    return runId;
  }
}

/**
 * Token provider for the configured credentials: a pre-issued token wins
 * over username and password.
 */
export function destinationTokenProvider(config: DestinationConfig, runtime: ClientRuntime = {}): TokenProvider {
  if (config.token) {
    return new StaticTokenProvider(config.token);
  }
  return new OAuthPasswordTokenProvider({
    baseUrl: config.baseUrl,
    username: config.username ?? '',
    password: config.password ?? '',
    fetch: runtime.fetch,
    clock: runtime.clock,
  });
}

/**
 * Build the destination adapter and its client from configuration.
 */
export function createQTestDestination(config: DestinationConfig, runtime: ClientRuntime = {}): QTestDestination {
  const client = new ApiClient({
    name: 'qtest',
    baseUrl: config.baseUrl,
    tokenProvider: destinationTokenProvider(config, runtime),
    rateLimit: config.rateLimit,
    retry: config.retry,
    circuitBreaker: config.circuitBreaker,
    timeoutMs: config.timeoutMs,
    ...runtime,
  });
  return new QTestDestination({ client, projectId: config.projectId, logger: runtime.logger?.child('qtest') });
}
