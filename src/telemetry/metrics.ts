/**
 * Cart service metrics.
 * Request and storage timings are labelled by method/operation and outcome; cart activity
 * is counted separately so dashboards can show carts opened and units added over time.
 */

import { metrics, Counter, Histogram } from '@opentelemetry/api';

const meter = metrics.getMeter('shoppingcartservice');

/** gRPC calls by method and status code name (OK, INVALID_ARGUMENT, NOT_FOUND, ...) */
const requestsTotal: Counter = meter.createCounter('cart_requests_total', {
  description: 'Cart gRPC requests by method and status',
  unit: '1',
});

const requestDuration: Histogram = meter.createHistogram('cart_request_duration_seconds', {
  description: 'Cart gRPC request latency',
  unit: 's',
});

/** Store calls by operation and outcome (success, invalid_argument, not_found, error) */
const storageOperationsTotal: Counter = meter.createCounter('cart_storage_operations_total', {
  description: 'Cart store operations by operation and outcome',
  unit: '1',
});

const storageDuration: Histogram = meter.createHistogram('cart_storage_duration_seconds', {
  description: 'Cart store operation latency',
  unit: 's',
});

const cartsCreatedTotal: Counter = meter.createCounter('carts_created_total', {
  description: 'Carts created by a first successful add',
  unit: '{cart}',
});

const unitsAddedTotal: Counter = meter.createCounter('cart_units_added_total', {
  description: 'Item units merged into carts',
  unit: '{unit}',
});

export function recordCartRequest(method: string, status: string, durationSeconds: number): void {
  requestsTotal.add(1, { method, status });
  requestDuration.record(durationSeconds, { method, status });
}

export function recordStorageOperation(operation: string, status: string, durationSeconds: number): void {
  storageOperationsTotal.add(1, { operation, status });
  storageDuration.record(durationSeconds, { operation, status });
}

export function recordCartCreated(): void {
  cartsCreatedTotal.add(1);
}

/**
 * @param newItem - whether the add created the line rather than merging into it
 */
export function recordUnitsAdded(quantity: number, newItem: boolean): void {
  unitsAddedTotal.add(quantity, { line: newItem ? 'created' : 'merged' });
}
