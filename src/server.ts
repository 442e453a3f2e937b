/**
 * gRPC server setup and configuration
 * Loads proto definitions, registers services, and manages server lifecycle
 */

import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import * as path from 'path';
import { ICartStore } from './storage/cart-store';
import { DelayInjector } from './resilience/delay-injector';
import { createCartHandlers } from './handlers/cart-handler';
import { createHealthHandlers } from './handlers/health-handler';
import { FaultConfig } from './utils/config';
import { logger } from './utils/logger';

const CART_PROTO_PATH = path.join(__dirname, '../proto/demo.proto');
const HEALTH_PROTO_PATH = path.join(__dirname, '../proto/grpc/health/v1/health.proto');

const LOADER_OPTIONS: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

function isServiceDefinition(
  definition: protoLoader.AnyDefinition | undefined
): definition is protoLoader.ServiceDefinition {
  // Message and enum definitions carry a `format` field, services do not
  return definition !== undefined && !('format' in definition);
}

/**
 * Load a proto file and return the named service definition
 */
export function loadServiceDefinition(protoPath: string, serviceName: string): grpc.ServiceDefinition {
  const packageDefinition = protoLoader.loadSync(protoPath, LOADER_OPTIONS);
  const definition = packageDefinition[serviceName];

  if (!isServiceDefinition(definition)) {
    throw new Error(`Service ${serviceName} not found in ${protoPath}`);
  }

  logger.debug('Proto definition loaded', { protoPath, serviceName });
  return definition;
}

/**
 * gRPC server instance
 */
export class CartServer {
  private server: grpc.Server;

  constructor(
    private readonly store: ICartStore,
    private readonly delayInjector: DelayInjector,
    private readonly port: number,
    private readonly fault: FaultConfig
  ) {
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
   * Register CartService and HealthService with their implementations
   */
  private registerServices(): void {
    this.server.addService(
      loadServiceDefinition(CART_PROTO_PATH, 'hipstershop.CartService'),
      createCartHandlers(this.store, this.delayInjector)
    );
    logger.debug('CartService registered');

    this.server.addService(
      loadServiceDefinition(HEALTH_PROTO_PATH, 'grpc.health.v1.Health'),
      createHealthHandlers(this.store, this.fault)
    );
    logger.debug('HealthService registered');
  }

  /**
   * Start the gRPC server and bind to the configured port
   */
  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const address = `0.0.0.0:${this.port}`;

      this.server.bindAsync(
        address,
        grpc.ServerCredentials.createInsecure(),
        (error, port) => {
          if (error) {
            logger.error('Failed to bind server', { error: error.message, address });
            reject(error);
            return;
          }

          logger.info('gRPC server started', { address, port });
          resolve();
        }
      );
    });
  }

  /**
   * Gracefully shutdown the gRPC server
   * Waits for existing requests to complete before shutting down
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

  /**
   * Force shutdown the gRPC server immediately
   */
  forceShutdown(): void {
    logger.warn('Force shutting down gRPC server');
    this.server.forceShutdown();
  }
}
