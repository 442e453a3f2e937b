/**
 * Protobuf serialization of carts, wire-compatible with hipstershop.Cart.
 */

import * as protobuf from 'protobufjs';
import * as path from 'path';
import { Cart, CartItem } from './cart-store';
import { logger, errorMessage } from '../utils/logger';
import { CartDeserializationError } from '../resilience/errors';

export const CART_PROTO_PATH = path.join(__dirname, '../../proto/demo.proto');

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

export class CartCodec {
    private CartMessage: protobuf.Type;

    constructor(protoPath: string = CART_PROTO_PATH) {
        const root = protobuf.loadSync(protoPath);
        this.CartMessage = root.lookupType('hipstershop.Cart');

        logger.debug('Proto definitions loaded for cart serialization', { protoPath });
    }

    /**
     * Serialize a Cart object to Protobuf binary format.
     */
    encode(cart: Cart): Buffer {
        // protobufjs expects camelCase for JavaScript objects
        const protoCart = {
            userId: cart.userId,
            items: cart.items.map(item => ({
                productId: item.productId,
                quantity: item.quantity,
            })),
        };

        const errMsg = this.CartMessage.verify(protoCart);
        if (errMsg) {
            throw new Error(`Invalid cart message: ${errMsg}`);
        }

        const message = this.CartMessage.create(protoCart);
        return Buffer.from(this.CartMessage.encode(message).finish());
    }

    /**
     * Deserialize stored bytes into a Cart for the given user.
     * @throws CartDeserializationError if the bytes are not a valid cart
     */
    decode(userId: string, buffer: Uint8Array): Cart {
        // A Buffer would get protobufjs' BufferReader, which clamps string reads instead of failing
        const view = new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);

        let plain: Record<string, unknown>;
        try {
            plain = this.CartMessage.toObject(this.CartMessage.decode(view), { defaults: true });
        } catch (error) {
            logger.error('Failed to decode stored cart', { userId, error: errorMessage(error) });
            throw new CartDeserializationError(userId, errorMessage(error));
        }

        const rawItems = Array.isArray(plain.items) ? plain.items : [];
        const seen = new Set<string>();
        const items: CartItem[] = rawItems.map((raw: unknown) => {
            if (!isRecord(raw) || typeof raw.productId !== 'string' || typeof raw.quantity !== 'number') {
                throw new CartDeserializationError(userId, 'cart item has an unexpected shape');
            }
            if (raw.quantity <= 0) {
                throw new CartDeserializationError(
                    userId,
                    `item ${raw.productId} has non-positive quantity ${raw.quantity}`
                );
            }
            if (seen.has(raw.productId)) {
                throw new CartDeserializationError(userId, `product ${raw.productId} appears more than once`);
            }
            seen.add(raw.productId);
            return { productId: raw.productId, quantity: raw.quantity };
        });

        // An empty cart is written without a user id, so the key is authoritative
        return { userId, items };
    }
}
