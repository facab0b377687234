import { Context, Info, Returns, Transaction } from 'fabric-contract-api';
import { AuthorizationError, MarketErrorCodes, StateError, ValueError } from '../errors';
import { readRecord, writeRecord } from '../ledger/state';
import { ProductCap } from '../models/Capability';
import { pendingBid, Product } from '../models/Product';
import { productStage } from '../rules/lifecycle';
import {
    boundedQualityScore,
    nonEmptyText,
    parseArg,
    positiveAmount,
    qualityScore
} from '../validation';
import { BaseContract } from './BaseContract';

@Info({ title: 'ProductContract', description: 'List products and manage supplier capabilities' })
export class ProductContract extends BaseContract {
    constructor() {
        super('ProductContract');
    }

    /**
     * Lists a product owned by the caller and mints the capability that
     * authorizes choosing a consumer and confirming the order.
     *
     * @param duration seconds from now until the fulfillment deadline
     * @returns JSON `{ product, cap }`
     */
    @Transaction()
    @Returns('string')
    async NewProduct(ctx: Context, description: string, quality: string, price: string, duration: string): Promise<string> {
        const config = await this.readConfig(ctx);
        const text = parseArg(nonEmptyText, 'description', description);
        const score = parseArg(config.enforceQualityRange ? boundedQualityScore : qualityScore, 'quality', quality);
        const minimumPrice = parseArg(positiveAmount, 'price', price);
        const window = parseArg(positiveAmount, 'duration', duration);

        const client = this.getClient(ctx);
        const txId = ctx.stub.getTxID();
        const now = this.now(ctx);
        const deadline = now + window;
        if (!Number.isSafeInteger(deadline)) {
            throw new ValueError(MarketErrorCodes.INVALID_ARGUMENT, `duration ${window} puts the deadline out of range`);
        }

        const product: Product = {
            id: `PRODUCT_${txId}`,
            docType: 'product',
            supplier: client.id,
            consumers: {},
            description: text,
            quality: score,
            price: minimumPrice,
            createdAt: now,
            deadline,
            status: false,
            consumer: null,
            orderSubmitted: false,
            dispute: false,
            payment: 0,
            settlement: null,
            updatedAt: now
        };
        const cap: ProductCap = {
            id: `PRODUCTCAP_${txId}`,
            docType: 'productCap',
            productId: product.id,
            owner: client.id
        };

        await writeRecord(ctx, product.id, product);
        await writeRecord(ctx, cap.id, cap);
        this.logger(ctx).info(`listed ${product.id} at price ${minimumPrice}, deadline ${product.deadline}`);
        return JSON.stringify({ product, cap });
    }

    @Transaction(false)
    @Returns('string')
    async ReadProduct(ctx: Context, productId: string): Promise<string> {
        const product = await this.readProduct(ctx, productId);
        return JSON.stringify({ ...product, stage: productStage(product) });
    }

    @Transaction(false)
    @Returns('string')
    async ReadProductCap(ctx: Context, capId: string): Promise<string> {
        const cap = await readRecord<ProductCap>(ctx, 'ProductCap', capId, 'productCap');
        return JSON.stringify(cap);
    }

    // Handing over the cap hands over control of the product
    @Transaction()
    async TransferProductCap(ctx: Context, capId: string, newOwner: string): Promise<void> {
        const owner = parseArg(nonEmptyText, 'newOwner', newOwner);
        const cap = await readRecord<ProductCap>(ctx, 'ProductCap', capId, 'productCap');
        if (cap.owner !== this.getClient(ctx).id) {
            throw new AuthorizationError(MarketErrorCodes.INVALID_CAPABILITY, `caller does not hold ${capId}`);
        }

        await writeRecord(ctx, cap.id, { ...cap, owner });
        this.logger(ctx).info(`${capId} transferred to ${owner}`);
    }

    @Transaction(false)
    @Returns('string')
    async ReadBid(ctx: Context, productId: string, bidder: string): Promise<string> {
        const product = await this.readProduct(ctx, productId);
        const bid = pendingBid(product, bidder);
        if (!bid) throw new StateError(MarketErrorCodes.NO_SUCH_BID, `no pending bid from ${bidder} on ${productId}`);
        return JSON.stringify(bid);
    }
}
