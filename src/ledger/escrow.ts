import { MarketErrorCodes, StateError } from '../errors';
import { Product, Settlement } from '../models/Product';

/** Merges a selection payment into the product's escrow. Only valid on an empty escrow. */
export function lockPayment(product: Product, amount: number): void {
    if (product.payment !== 0 || product.settlement !== null) {
        throw new StateError(MarketErrorCodes.OUT_OF_STOCK, `escrow of ${product.id} was already filled`);
    }
    product.payment = amount;
}

/**
 * Drains the whole escrow and records how it was settled. The balance is
 * zeroed in the same product write that stores the settlement, so a fill can
 * only be withdrawn once.
 */
export function withdrawAll(product: Product, settlement: Settlement): number {
    if (product.payment <= 0 || product.settlement !== null) {
        throw new StateError(MarketErrorCodes.ESCROW_EMPTY, `escrow of ${product.id} is empty`);
    }
    const amount = product.payment;
    product.payment = 0;
    product.settlement = settlement;
    return amount;
}
