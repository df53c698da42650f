/**
 * gRPC health check handler
 * Implements the standard gRPC health check protocol
 */

import * as grpc from '@grpc/grpc-js';
import { ICartStore } from '../storage/cart-store';
import { logger } from '../utils/logger';
import { UnaryCall } from './cart-handler';

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

/**
 * Create Health service gRPC handlers
 */
export function createHealthHandlers(store: ICartStore) {
  return {
    /**
     * Returns SERVING if the cart store answers a ping
     */
    async check(
      call: UnaryCall<HealthCheckRequest>,
      callback: grpc.sendUnaryData<HealthCheckResponse>
    ): Promise<void> {
      logger.debug('Health check requested', { service: call.request.service });

      let isStorageHealthy: boolean;
      try {
        isStorageHealthy = await store.ping();
      } catch (error) {
        logger.error('Health check error', {
          error: error instanceof Error ? error.message : String(error),
        });
        isStorageHealthy = false;
      }

      if (isStorageHealthy) {
        logger.debug('Health check passed');
        callback(null, { status: ServingStatus.SERVING });
      } else {
        logger.warn('Health check failed: storage not accessible');
        callback(null, { status: ServingStatus.NOT_SERVING });
      }
    },
  };
}
