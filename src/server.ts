/**
 * gRPC server setup and configuration
 * Loads proto definitions, registers services, and manages server lifecycle
 */

import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import * as path from 'path';
import { ICartStore } from './storage/cart-store';
import { createCartHandlers } from './handlers/cart-handler';
import { createHealthHandlers } from './handlers/health-handler';
import { logger } from './utils/logger';
import { config } from './utils/config';

export const CART_PROTO_PATH = path.join(__dirname, '../proto/shoppingcart.proto');
export const HEALTH_PROTO_PATH = path.join(__dirname, '../proto/grpc/health/v1/health.proto');

const LOADER_OPTIONS: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

/**
 * Load a .proto file and return the definition of one of its services.
 * @param serviceName - Fully qualified name, e.g. `shoppingcart.ShoppingCartService`
 */
export function loadServiceDefinition(protoPath: string, serviceName: string): grpc.ServiceDefinition {
  const packageDefinition = protoLoader.loadSync(protoPath, LOADER_OPTIONS);
  const definition = packageDefinition[serviceName];

  if (!definition || 'format' in definition) {
    throw new Error(`Service ${serviceName} not found in ${protoPath}`);
  }

  logger.debug('Proto definition loaded', { protoPath, serviceName });
  return definition;
}

export class CartServer {
  private server: grpc.Server;
  private store: ICartStore;

  constructor(store: ICartStore) {
    this.store = store;
    this.server = new grpc.Server({
      'grpc.max_send_message_length': 4 * 1024 * 1024, // 4MB
      'grpc.max_receive_message_length': 4 * 1024 * 1024, // 4MB
      'grpc.keepalive_time_ms': 120000, // 2 minutes
      'grpc.keepalive_timeout_ms': 20000, // 20 seconds
      'grpc.keepalive_permit_without_calls': 1,
      'grpc.http2.min_time_between_pings_ms': 120000,
      'grpc.http2.max_pings_without_data': 0,
    });

    this.registerServices();
  }

  /**
   * Register ShoppingCartService and HealthService with their implementations
   */
  private registerServices(): void {
    this.server.addService(
      loadServiceDefinition(CART_PROTO_PATH, 'shoppingcart.ShoppingCartService'),
      createCartHandlers(this.store)
    );
    logger.debug('ShoppingCartService registered');

    this.server.addService(
      loadServiceDefinition(HEALTH_PROTO_PATH, 'grpc.health.v1.Health'),
      createHealthHandlers(this.store)
    );
    logger.debug('HealthService registered');
  }

  /**
   * Bind to the configured address and start serving
   * @returns the bound port
   */
  async start(host: string = config.host, port: number = config.port): Promise<number> {
    return new Promise((resolve, reject) => {
      const address = `${host}:${port}`;

      this.server.bindAsync(
        address,
        grpc.ServerCredentials.createInsecure(),
        (error, boundPort) => {
          if (error) {
            logger.error('Failed to bind server', { error: error.message, address });
            reject(error);
            return;
          }

          logger.info('gRPC server started', { address, port: boundPort });
          resolve(boundPort);
        }
      );
    });
  }

  /**
   * Gracefully shutdown the gRPC server
   * Waits for in-flight requests to complete before shutting down
   */
  async shutdown(): Promise<void> {
    return new Promise((resolve) => {
      logger.info('Shutting down gRPC server...');

      this.server.tryShutdown((error) => {
        if (error) {
          logger.warn('Error during graceful shutdown, forcing shutdown', {
            error: error.message,
          });
          this.server.forceShutdown();
        } else {
          logger.info('gRPC server shut down gracefully');
        }
        resolve();
      });
    });
  }

  forceShutdown(): void {
    logger.warn('Force shutting down gRPC server');
    this.server.forceShutdown();
  }
}
