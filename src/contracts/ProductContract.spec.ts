import { ProductCap } from '../models/Capability';
import { Product } from '../models/Product';
import { ADMIN, ALICE, BOB, Market, SUPPLIER } from '../testing/Market';

describe('ProductContract', () => {
    let market: Market;
    let T: number;

    beforeEach(async () => {
        market = new Market();
        T = market.start;
        await market.initialize();
    });

    describe('NewProduct', () => {
        it('lists an open product and mints its capability for the caller', async () => {
            const result = await market.ledger.submit(SUPPLIER, (ctx) => market.products.NewProduct(ctx, 'Crate of mangoes', '90', '100', '3600'));
            const { product, cap }: { product: Product; cap: ProductCap } = JSON.parse(result);

            expect(product).toEqual({
                id: product.id,
                docType: 'product',
                supplier: SUPPLIER,
                consumers: {},
                description: 'Crate of mangoes',
                quality: 90,
                price: 100,
                createdAt: T,
                deadline: T + 3600,
                status: false,
                consumer: null,
                orderSubmitted: false,
                dispute: false,
                payment: 0,
                settlement: null,
                updatedAt: T
            });
            expect(cap).toEqual({ id: cap.id, docType: 'productCap', productId: product.id, owner: SUPPLIER });
            expect(market.ledger.read(product.id)).toEqual(product);
            expect(market.ledger.read(cap.id)).toEqual(cap);
            expect(product.id).not.toBe(cap.id);
        });

        const invalid: Array<[string, string, string, string, string]> = [
            ['price', 'Lot', '50', '0', '100'],
            ['price', 'Lot', '50', 'ten', '100'],
            ['duration', 'Lot', '50', '100', '-1'],
            ['description', '  ', '50', '100', '100'],
        ];

        it.each(invalid)('rejects an invalid %s', async (_field, description, quality, price, duration) => {
            await expect(market.ledger.submit(SUPPLIER, (ctx) => market.products.NewProduct(ctx, description, quality, price, duration)))
                .rejects.toMatchObject({ code: 'InvalidArgument' });
            expect(market.ledger.state.size).toBe(2);
        });

        it('rejects a duration that pushes the deadline out of range', async () => {
            await expect(market.list({ duration: Number.MAX_SAFE_INTEGER })).rejects.toMatchObject({ code: 'InvalidArgument' });
            expect(market.ledger.state.size).toBe(2);
        });

        it('rejects quality outside 0-100 by default', async () => {
            await expect(market.list({ quality: 101 })).rejects.toMatchObject({ code: 'InvalidArgument' });
            await expect(market.list({ quality: -1 })).rejects.toMatchObject({ code: 'InvalidArgument' });
            await expect(market.list({ quality: 100 })).resolves.toBeDefined();
        });

        it('accepts any integer quality when the range check is off', async () => {
            await market.ledger.submit(ADMIN, (ctx) => market.admin.UpdateConfig(ctx, '{"enforceQualityRange":false}'));

            const { productId } = await market.list({ quality: 150 });

            expect(market.product(productId).quality).toBe(150);
            await expect(market.list({ quality: 7.5 })).rejects.toMatchObject({ code: 'InvalidArgument' });
        });
    });

    describe('capabilities', () => {
        it('hands control to the new cap owner', async () => {
            const listing = await market.list();
            await market.bid(ALICE, listing.productId);
            await market.fund(BOB, 200);

            await market.ledger.submit(SUPPLIER, (ctx) => market.products.TransferProductCap(ctx, listing.capId, BOB));

            const cap: ProductCap = JSON.parse(await market.ledger.submit(ALICE, (ctx) => market.products.ReadProductCap(ctx, listing.capId)));
            expect(cap.owner).toBe(BOB);
            await expect(market.choose(listing, ALICE, 100)).rejects.toMatchObject({ code: 'InvalidCapability' });

            await market.ledger.submit(BOB, (ctx) => market.orders.ChooseConsumer(ctx, listing.capId, listing.productId, '120', ALICE));
            expect(market.product(listing.productId).payment).toBe(120);
            expect(market.ledger.balance(BOB)).toBe(80);
        });

        it('only lets the holder transfer', async () => {
            const listing = await market.list();

            await expect(market.ledger.submit(BOB, (ctx) => market.products.TransferProductCap(ctx, listing.capId, BOB)))
                .rejects.toMatchObject({ code: 'InvalidCapability' });
        });
    });

    describe('reads', () => {
        it('reports the lifecycle stage with the product', async () => {
            const listing = await market.list();
            const read = async () => JSON.parse(await market.ledger.submit(BOB, (ctx) => market.products.ReadProduct(ctx, listing.productId)));

            expect((await read()).stage).toBe('LISTED');
            await market.bid(ALICE, listing.productId);
            expect((await read()).stage).toBe('BIDDING_OPEN');
        });

        it('reads a pending bid by bidder', async () => {
            const listing = await market.list();
            const consumer = await market.bid(ALICE, listing.productId);

            const bid = await market.ledger.submit(SUPPLIER, (ctx) => market.products.ReadBid(ctx, listing.productId, ALICE));
            expect(JSON.parse(bid)).toEqual(consumer);
            await expect(market.ledger.submit(SUPPLIER, (ctx) => market.products.ReadBid(ctx, listing.productId, 'constructor')))
                .rejects.toMatchObject({ code: 'NoSuchBid' });
        });

        it('reports unknown products', async () => {
            await expect(market.ledger.submit(BOB, (ctx) => market.products.ReadProduct(ctx, 'PRODUCT_missing')))
                .rejects.toMatchObject({ code: 'NotFound' });
        });

        it('does not read one kind of record as another', async () => {
            const listing = await market.list();

            await expect(market.ledger.submit(BOB, (ctx) => market.products.ReadProduct(ctx, listing.capId)))
                .rejects.toMatchObject({ code: 'NotFound', message: `[NotFound] Product ${listing.capId} not found` });
            await expect(market.ledger.submit(BOB, (ctx) => market.products.ReadProductCap(ctx, listing.productId)))
                .rejects.toMatchObject({ code: 'NotFound' });
            await expect(market.ledger.submit(SUPPLIER, (ctx) => market.orders.ChooseConsumer(ctx, listing.productId, listing.productId, '100', ALICE)))
                .rejects.toMatchObject({ code: 'NotFound' });
        });
    });
});
