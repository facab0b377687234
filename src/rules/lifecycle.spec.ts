import { Product, Settlement } from '../models/Product';
import { productStage, ProductStage } from './lifecycle';

const base: Product = {
    id: 'PRODUCT_tx1',
    docType: 'product',
    supplier: 'supplier',
    consumers: {},
    description: 'Lot',
    quality: 50,
    price: 100,
    createdAt: 0,
    deadline: 1000,
    status: false,
    consumer: null,
    orderSubmitted: false,
    dispute: false,
    payment: 0,
    settlement: null,
    updatedAt: 0
};

const bid = {
    id: 'CONSUMER_tx2',
    docType: 'consumer' as const,
    productId: 'PRODUCT_tx1',
    bidder: 'alice',
    description: 'Bid',
    requirements: [],
    createdAt: 0
};

describe('productStage', () => {
    const cases: Array<[ProductStage, Partial<Product>]> = [
        [ProductStage.LISTED, {}],
        [ProductStage.BIDDING_OPEN, { consumers: { alice: bid } }],
        [ProductStage.SELECTED, { status: true, consumer: 'alice', payment: 100 }],
        [ProductStage.SUBMITTED, { status: true, consumer: 'alice', payment: 100, orderSubmitted: true }],
        [ProductStage.DISPUTED, { status: true, consumer: 'alice', payment: 100, dispute: true }],
        [ProductStage.CONFIRMED, { status: true, consumer: 'alice', orderSubmitted: true, settlement: Settlement.CONFIRMED }],
        [ProductStage.RESOLVED_CONSUMER, { status: true, consumer: 'alice', settlement: Settlement.RESOLVED_FOR_CONSUMER }],
        [ProductStage.RESOLVED_SUPPLIER, { status: true, consumer: 'alice', settlement: Settlement.RESOLVED_FOR_SUPPLIER }],
    ];

    it.each(cases)('reports %s', (stage, overrides) => {
        expect(productStage({ ...base, ...overrides })).toBe(stage);
    });
});
