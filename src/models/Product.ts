import { MarketErrorCodes, StateError } from '../errors';
import { Consumer } from './Consumer';

export enum Settlement {
    CONFIRMED = 'CONFIRMED',                           // Supplier confirmed, escrow paid out
    RESOLVED_FOR_CONSUMER = 'RESOLVED_FOR_CONSUMER',   // Arbitrator sided with the consumer
    RESOLVED_FOR_SUPPLIER = 'RESOLVED_FOR_SUPPLIER'    // Arbitrator returned funds to supplier
}

export interface Product {
    id: string;             // "PRODUCT_<txId>"
    docType: 'product';

    supplier: string;       // Client identity of the creator, never changes
    consumers: Record<string, Consumer>;   // Pending bids keyed by bidder

    description: string;
    quality: number;        // 0-100 score
    price: number;          // Minimum acceptable payment
    createdAt: number;      // Epoch seconds
    deadline: number;       // Epoch seconds, createdAt + duration

    status: boolean;        // false = accepting bids, true = consumer chosen
    consumer: string | null;
    orderSubmitted: boolean;
    dispute: boolean;

    payment: number;        // Escrowed balance
    settlement: Settlement | null;

    updatedAt: number;
}

export function pendingBid(product: Product, bidder: string): Consumer | undefined {
    return Object.prototype.hasOwnProperty.call(product.consumers, bidder) ? product.consumers[bidder] : undefined;
}

export function selectedConsumer(product: Product): string {
    if (product.consumer === null) {
        throw new StateError(MarketErrorCodes.NO_CONSUMER_SELECTED, `no consumer was chosen for ${product.id}`);
    }
    return product.consumer;
}
