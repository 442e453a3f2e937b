/**
 * gRPC handlers for CartService operations
 * Implements AddItem, GetCart, and EmptyCart methods
 */

import * as grpc from '@grpc/grpc-js';
import { ICartStore } from '../storage/cart-store';
import { DelayInjector } from '../resilience/delay-injector';
import {
  CartDeserializationError,
  GatewayTimeoutError,
  OperationCancelledError,
  isRetryableByCaller,
} from '../resilience/errors';
import { logger, errorMessage } from '../utils/logger';
import { recordCartRequest } from '../telemetry/metrics';

/**
 * gRPC request/response types based on proto definitions
 */
export interface AddItemRequest {
  user_id: string;
  item?: {
    product_id: string;
    quantity: number;
  } | null;
}

export interface GetCartRequest {
  user_id: string;
}

export interface EmptyCartRequest {
  user_id: string;
}

export interface GetCartResponse {
  user_id: string;
  items: Array<{ product_id: string; quantity: number }>;
}

export interface Empty {}

/**
 * The parts of a unary call the handlers use
 */
export type CartCall<Request> = Pick<grpc.ServerUnaryCall<Request, unknown>, 'request'> & {
  on(event: 'cancelled', listener: () => void): unknown;
};

/**
 * Map a failure to the status returned to the client.
 * Exhausted retries and gateway timeouts are UNAVAILABLE so callers may retry.
 */
export function toGrpcStatus(error: unknown): grpc.status {
  if (isRetryableByCaller(error)) {
    return grpc.status.UNAVAILABLE;
  }
  if (error instanceof CartDeserializationError) {
    return grpc.status.DATA_LOSS;
  }
  if (error instanceof OperationCancelledError) {
    return grpc.status.CANCELLED;
  }
  if (error instanceof RangeError) {
    return grpc.status.INVALID_ARGUMENT;
  }
  return grpc.status.INTERNAL;
}

function isBlank(value: string | undefined | null): boolean {
  return !value || value.trim() === '';
}

/**
 * Abort the returned signal when the client cancels the call
 */
function cancellationSignal<Request>(call: CartCall<Request>): AbortSignal {
  const controller = new AbortController();
  call.on('cancelled', () => controller.abort());
  return controller.signal;
}

/**
 * Create CartService gRPC handlers
 */
export function createCartHandlers(store: ICartStore, delayInjector: DelayInjector) {
  const reject = <T>(
    method: string,
    startTime: number,
    callback: grpc.sendUnaryData<T>,
    code: grpc.status,
    message: string
  ): void => {
    recordCartRequest(method, grpc.status[code], (Date.now() - startTime) / 1000);
    callback({ code, message });
  };

  const fail = <T>(
    method: string,
    startTime: number,
    callback: grpc.sendUnaryData<T>,
    error: unknown
  ): void => {
    const message = error instanceof GatewayTimeoutError || error instanceof RangeError
      ? error.message
      : `Can't access cart storage: ${errorMessage(error)}`;
    reject(method, startTime, callback, toGrpcStatus(error), message);
  };

  return {
    /**
     * Add an item to a user's cart
     */
    async addItem(
      call: CartCall<AddItemRequest>,
      callback: grpc.sendUnaryData<Empty>
    ): Promise<void> {
      const startTime = Date.now();
      const request = call.request;
      const item = request.item;

      if (isBlank(request.user_id)) {
        logger.warn('AddItem called with missing user_id');
        reject('AddItem', startTime, callback, grpc.status.INVALID_ARGUMENT, 'user_id is required');
        return;
      }

      if (!item) {
        logger.warn('AddItem called with missing item', { userId: request.user_id });
        reject('AddItem', startTime, callback, grpc.status.INVALID_ARGUMENT, 'item is required');
        return;
      }

      if (isBlank(item.product_id)) {
        logger.warn('AddItem called with missing product_id', { userId: request.user_id });
        reject('AddItem', startTime, callback, grpc.status.INVALID_ARGUMENT, 'product_id is required');
        return;
      }

      if (!Number.isInteger(item.quantity) || item.quantity <= 0) {
        logger.warn('AddItem called with invalid quantity', {
          userId: request.user_id,
          productId: item.product_id,
          quantity: item.quantity,
        });
        reject('AddItem', startTime, callback, grpc.status.INVALID_ARGUMENT, 'quantity must be greater than 0');
        return;
      }

      const signal = cancellationSignal(call);
      try {
        await delayInjector.run(
          'AddItem',
          () => store.addItem(request.user_id, item.product_id, item.quantity, signal),
          signal
        );

        logger.info('Item added to cart', {
          userId: request.user_id,
          productId: item.product_id,
          quantity: item.quantity,
        });

        recordCartRequest('AddItem', 'OK', (Date.now() - startTime) / 1000);
        callback(null, {});
      } catch (error) {
        logger.error('Failed to add item to cart', {
          userId: request.user_id,
          productId: item.product_id,
          error: errorMessage(error),
        });
        fail('AddItem', startTime, callback, error);
      }
    },

    /**
     * Get a user's complete shopping cart
     */
    async getCart(
      call: CartCall<GetCartRequest>,
      callback: grpc.sendUnaryData<GetCartResponse>
    ): Promise<void> {
      const startTime = Date.now();
      const request = call.request;

      if (isBlank(request.user_id)) {
        logger.warn('GetCart called with missing user_id');
        reject('GetCart', startTime, callback, grpc.status.INVALID_ARGUMENT, 'user_id is required');
        return;
      }

      const signal = cancellationSignal(call);
      try {
        const cart = await delayInjector.run('GetCart', () => store.getCart(request.user_id, signal), signal);

        logger.info('Cart retrieved', {
          userId: request.user_id,
          itemCount: cart.items.length,
        });

        // Convert to gRPC response format (snake_case for proto)
        const response: GetCartResponse = {
          user_id: cart.userId,
          items: cart.items.map(cartItem => ({
            product_id: cartItem.productId,
            quantity: cartItem.quantity,
          })),
        };

        recordCartRequest('GetCart', 'OK', (Date.now() - startTime) / 1000);
        callback(null, response);
      } catch (error) {
        logger.error('Failed to get cart', {
          userId: request.user_id,
          error: errorMessage(error),
        });
        fail('GetCart', startTime, callback, error);
      }
    },

    /**
     * Empty a user's shopping cart
     */
    async emptyCart(
      call: CartCall<EmptyCartRequest>,
      callback: grpc.sendUnaryData<Empty>
    ): Promise<void> {
      const startTime = Date.now();
      const request = call.request;

      if (isBlank(request.user_id)) {
        logger.warn('EmptyCart called with missing user_id');
        reject('EmptyCart', startTime, callback, grpc.status.INVALID_ARGUMENT, 'user_id is required');
        return;
      }

      const signal = cancellationSignal(call);
      try {
        await delayInjector.run('EmptyCart', () => store.emptyCart(request.user_id, signal), signal);

        logger.info('Cart emptied', {
          userId: request.user_id,
        });

        recordCartRequest('EmptyCart', 'OK', (Date.now() - startTime) / 1000);
        callback(null, {});
      } catch (error) {
        logger.error('Failed to empty cart', {
          userId: request.user_id,
          error: errorMessage(error),
        });
        fail('EmptyCart', startTime, callback, error);
      }
    },
  };
}
