/**
 * Request Batcher
 *
 * Sends a list of requests on the current session, waits for all of them
 * and returns results in request order. Any retriable failure resubmits
 * the whole batch on a fresh session; there is no partial reuse.
 *
 * @module rpc/RequestBatcher
 */

import type { Logger } from 'pino';
import type { Session } from '../session/Session.js';
import { TimeoutLevel, TimeoutManager } from '../resilience/TimeoutManager.js';
import { ErrorUtils, RpcError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { endpointLabel } from '../types/index.js';
import type { RequestId, RpcParams, RpcRequest, RpcResult } from '../types/index.js';
import type { FailoverController } from './FailoverController.js';

export interface RequestBatcherOptions {
  timeouts?: TimeoutManager;
  logger?: Logger;
}

export class RequestBatcher {
  private controller: FailoverController;
  private timeouts: TimeoutManager;
  private logger: Logger;

  constructor(controller: FailoverController, options: RequestBatcherOptions = {}) {
    this.controller = controller;
    this.timeouts = options.timeouts ?? new TimeoutManager();
    this.logger = options.logger ?? createLogger('batcher');
  }

  /**
   * Results line up index-for-index with `requests`. Server error objects
   * come back in `result.error`; only transport trouble causes a retry.
   * @throws FailoverExhaustedError once no server is left to try
   */
  async sendAndAwaitAll(requests: readonly RpcRequest[]): Promise<RpcResult[]> {
    if (requests.length === 0) {
      return [];
    }

    for (let attempt = 1; ; attempt++) {
      const session = await this.controller.getSession();

      let ids: RequestId[];
      try {
        ids = requests.map(({ method, params }) => session.send(method, params));
      } catch (error) {
        await this.retryOrThrow(error, session, attempt);
        continue;
      }

      try {
        const results = await Promise.all(ids.map((id) => this.await(session, id)));
        this.controller.resetFailures();
        return results;
      } catch (error) {
        for (const id of ids) {
          session.cancel(id);
        }
        await this.retryOrThrow(error, session, attempt);
      }
    }
  }

  /**
   * Single request that must succeed
   * @throws RpcError when the server answers with an error object
   */
  async runCommand(method: string, params: RpcParams = []): Promise<unknown> {
    const [result] = await this.sendAndAwaitAll([{ method, params }]);
    if (result?.error) {
      throw new RpcError(method, result.error);
    }
    return result?.data;
  }

  private await(session: Session, id: RequestId): Promise<RpcResult> {
    return this.timeouts.execute(
      () => session.awaitResult(id),
      TimeoutLevel.REQUEST,
      `request ${id}`,
      endpointLabel(session.endpoint),
    );
  }

  private async retryOrThrow(error: unknown, session: Session, attempt: number): Promise<void> {
    if (!ErrorUtils.isRetriable(error) || !(error instanceof Error)) {
      throw error;
    }
    this.logger.warn(
      { server: endpointLabel(session.endpoint), attempt, err: error },
      'Batch failed, resubmitting on another server',
    );
    await this.controller.failover(error, session);
  }
}
