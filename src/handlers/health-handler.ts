/**
 * grpc.health.v1.Health check for the cart service.
 * Storage counts as down when the cache does not answer a ping, or when
 * fault injection is configured so that no storage call can succeed.
 */

import * as grpc from '@grpc/grpc-js';
import { ICartStore } from '../storage/cart-store';
import { FaultConfig } from '../utils/config';
import { logger, errorMessage } from '../utils/logger';

export interface HealthCheckRequest {
  service: string;
}

export interface HealthCheckResponse {
  status: ServingStatus;
}

export enum ServingStatus {
  UNKNOWN = 0,
  SERVING = 1,
  NOT_SERVING = 2,
}

export type HealthSettings = Pick<FaultConfig, 'enabled' | 'failureRate' | 'maxRetries'>;

/**
 * True when every first attempt is failed by injection and nothing is retried.
 */
export function injectionBlocksStorage(fault: HealthSettings): boolean {
  return fault.enabled && fault.failureRate >= 1 && fault.maxRetries === 0;
}

/**
 * Reason storage is unusable, or null when it is usable
 */
async function storageProblem(store: Pick<ICartStore, 'ping'>, fault: HealthSettings): Promise<string | null> {
  if (injectionBlocksStorage(fault)) {
    return 'fault injection fails every attempt and retries are disabled';
  }
  try {
    return (await store.ping()) ? null : 'cache did not answer ping';
  } catch (error) {
    return `cache ping failed: ${errorMessage(error)}`;
  }
}

export function createHealthHandlers(store: Pick<ICartStore, 'ping'>, fault: HealthSettings) {
  return {
    async check(
      call: Pick<grpc.ServerUnaryCall<HealthCheckRequest, HealthCheckResponse>, 'request'>,
      callback: grpc.sendUnaryData<HealthCheckResponse>
    ): Promise<void> {
      const problem = await storageProblem(store, fault);

      if (problem === null) {
        logger.debug('Health check passed', { service: call.request.service });
        callback(null, { status: ServingStatus.SERVING });
        return;
      }

      logger.warn('Reporting NOT_SERVING', { service: call.request.service, reason: problem });
      callback(null, { status: ServingStatus.NOT_SERVING });
    },
  };
}
