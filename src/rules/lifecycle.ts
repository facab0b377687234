import { Product, Settlement } from '../models/Product';

export enum ProductStage {
    LISTED = 'LISTED',                       // No bids yet
    BIDDING_OPEN = 'BIDDING_OPEN',           // At least one pending bid
    SELECTED = 'SELECTED',                   // Consumer chosen, escrow locked
    SUBMITTED = 'SUBMITTED',                 // Consumer confirmed intent
    CONFIRMED = 'CONFIRMED',                 // Escrow released by the supplier
    DISPUTED = 'DISPUTED',                   // Awaiting arbitration
    RESOLVED_CONSUMER = 'RESOLVED_CONSUMER',
    RESOLVED_SUPPLIER = 'RESOLVED_SUPPLIER'
}

export function productStage(product: Product): ProductStage {
    switch (product.settlement) {
        case Settlement.CONFIRMED: return ProductStage.CONFIRMED;
        case Settlement.RESOLVED_FOR_CONSUMER: return ProductStage.RESOLVED_CONSUMER;
        case Settlement.RESOLVED_FOR_SUPPLIER: return ProductStage.RESOLVED_SUPPLIER;
        case null: break;
    }
    if (product.dispute) return ProductStage.DISPUTED;
    if (product.status) return product.orderSubmitted ? ProductStage.SUBMITTED : ProductStage.SELECTED;
    return Object.keys(product.consumers).length > 0 ? ProductStage.BIDDING_OPEN : ProductStage.LISTED;
}
