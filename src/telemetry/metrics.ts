/**
 * Custom metrics for cart operations
 * Provides counters and histograms for monitoring cart service performance
 * and the faults, retries and delays the resilience layer produces
 */

import { metrics } from '@opentelemetry/api';
import { Counter, Histogram } from '@opentelemetry/api';

// Get meter for cart service
const meter = metrics.getMeter('cartservice');

/**
 * Counter for total cart requests by method and status
 */
export const cartRequestsTotal: Counter = meter.createCounter('cart_requests_total', {
  description: 'Total number of cart requests by method and status',
  unit: '1',
});

/**
 * Histogram for cart request duration in seconds
 */
export const cartRequestDuration: Histogram = meter.createHistogram('cart_request_duration_seconds', {
  description: 'Duration of cart requests in seconds',
  unit: 's',
});

/**
 * Counter for storage operations
 */
export const cartStorageOperationsTotal: Counter = meter.createCounter('cart_storage_operations_total', {
  description: 'Total number of cart storage operations',
  unit: '1',
});

/**
 * Histogram for storage operation duration in seconds
 */
export const cartStorageDuration: Histogram = meter.createHistogram('cart_storage_duration_seconds', {
  description: 'Duration of cart storage operations in seconds',
  unit: 's',
});

export const cartFaultsInjectedTotal: Counter = meter.createCounter('cart_faults_injected_total', {
  description: 'Synthetic storage faults injected, by operation and kind',
  unit: '1',
});

export const cartStorageRetriesTotal: Counter = meter.createCounter('cart_storage_retries_total', {
  description: 'Storage operation retries, by operation and outcome',
  unit: '1',
});

export const cartRpcDelaysTotal: Counter = meter.createCounter('cart_rpc_delays_total', {
  description: 'Injected RPC delays, by operation and whether they timed out',
  unit: '1',
});

/**
 * Record a cart request with method and status
 */
export function recordCartRequest(method: string, status: string, durationSeconds: number): void {
  cartRequestsTotal.add(1, { method, status });
  cartRequestDuration.record(durationSeconds, { method, status });
}

/**
 * Record a storage operation with operation type and status
 */
export function recordStorageOperation(operation: string, status: string, durationSeconds: number): void {
  cartStorageOperationsTotal.add(1, { operation, status });
  cartStorageDuration.record(durationSeconds, { operation, status });
}

export function recordFaultInjected(operation: string, kind: string): void {
  cartFaultsInjectedTotal.add(1, { operation, kind });
}

/**
 * Record a retry decision: "retrying" for a scheduled retry, "exhausted"
 * when the budget ran out
 */
export function recordStorageRetry(operation: string, outcome: 'retrying' | 'exhausted'): void {
  cartStorageRetriesTotal.add(1, { operation, outcome });
}

export function recordRpcDelay(operation: string, timedOut: boolean): void {
  cartRpcDelaysTotal.add(1, { operation, timed_out: timedOut });
}
