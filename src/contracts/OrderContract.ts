import { Context, Info, Returns, Transaction } from 'fabric-contract-api';
import {
    AuthorizationError,
    MarketErrorCodes,
    StateError,
    TimingError,
    ValueError
} from '../errors';
import { credit, prepareDebit } from '../ledger/accounts';
import { lockPayment, withdrawAll } from '../ledger/escrow';
import { readRecord, writeRecord } from '../ledger/state';
import { Consumer } from '../models/Consumer';
import { pendingBid, Product, selectedConsumer, Settlement } from '../models/Product';
import { assertRequirementsMet } from '../rules/requirements';
import {
    nonEmptyText,
    parseArg,
    parseRequirements,
    positiveAmount
} from '../validation';
import { BaseContract } from './BaseContract';

@Info({ title: 'OrderContract', description: 'Bidding, consumer selection and escrowed order settlement' })
export class OrderContract extends BaseContract {
    constructor() {
        super('OrderContract');
    }

    /**
     * Creates a bid owned by the caller. The product is not touched until the
     * bid is attached with OrderProduct.
     *
     * @param requirementsJson JSON array of tags, e.g. `["high_quality"]`
     */
    @Transaction()
    @Returns('string')
    async NewConsumer(ctx: Context, productId: string, description: string, requirementsJson: string): Promise<string> {
        const target = parseArg(nonEmptyText, 'productId', productId);
        const text = parseArg(nonEmptyText, 'description', description);
        const requirements = parseRequirements(requirementsJson);
        const client = this.getClient(ctx);

        const consumer: Consumer = {
            id: `CONSUMER_${ctx.stub.getTxID()}`,
            docType: 'consumer',
            productId: target,
            bidder: client.id,
            description: text,
            requirements,
            createdAt: this.now(ctx)
        };

        await writeRecord(ctx, consumer.id, consumer);
        return JSON.stringify(consumer);
    }

    @Transaction(false)
    @Returns('string')
    async ReadConsumer(ctx: Context, consumerId: string): Promise<string> {
        const consumer = await readRecord<Consumer>(ctx, 'Consumer', consumerId, 'consumer');
        return JSON.stringify(consumer);
    }

    @Transaction()
    async OrderProduct(ctx: Context, productId: string, consumerId: string): Promise<void> {
        const client = this.getClient(ctx);

        // 1. Verify the bid belongs to the caller and targets this product
        const consumer = await readRecord<Consumer>(ctx, 'Consumer', consumerId, 'consumer');
        if (consumer.bidder !== client.id) {
            throw new AuthorizationError(MarketErrorCodes.WRONG_ADDRESS, `${consumerId} does not belong to the caller`);
        }
        if (consumer.productId !== productId) {
            throw new StateError(MarketErrorCodes.PRODUCT_MISMATCH, `${consumerId} was made for ${consumer.productId}`);
        }

        // 2. Product must still be accepting bids
        const product = await this.readProduct(ctx, productId);
        if (product.status) {
            throw new StateError(MarketErrorCodes.OUT_OF_STOCK, `${productId} is no longer accepting bids`);
        }

        // 3. Requirements against quality, then uniqueness of the bidder key
        assertRequirementsMet(consumer.requirements, product.quality, await this.readConfig(ctx));
        if (pendingBid(product, consumer.bidder)) {
            throw new StateError(MarketErrorCodes.DUPLICATE_BID, `${consumer.bidder} already has a pending bid on ${productId}`);
        }

        // 4. The bid now lives in the product's table
        product.consumers = { ...product.consumers, [consumer.bidder]: consumer };
        product.updatedAt = this.now(ctx);

        await writeRecord(ctx, product.id, product);
        await ctx.stub.deleteState(consumer.id);
        this.logger(ctx).info(`bid ${consumer.id} placed on ${productId} in ${ctx.stub.getTxID()}`);
    }

    // Bidder takes back a pending bid while bidding is still open
    @Transaction()
    @Returns('string')
    async WithdrawBid(ctx: Context, productId: string): Promise<string> {
        const client = this.getClient(ctx);
        const product = await this.readProduct(ctx, productId);
        if (product.status) {
            throw new StateError(MarketErrorCodes.OUT_OF_STOCK, `${productId} is no longer accepting bids`);
        }
        const bid = pendingBid(product, client.id);
        if (!bid) {
            throw new StateError(MarketErrorCodes.NO_SUCH_BID, `no pending bid from ${client.id} on ${productId}`);
        }

        product.consumers = withoutBid(product, client.id);
        product.updatedAt = this.now(ctx);

        await writeRecord(ctx, product.id, product);
        this.logger(ctx).info(`bid ${bid.id} withdrawn from ${productId}`);
        return JSON.stringify(bid);
    }

    /**
     * Selects the winning bid, moves `payment` from the caller's account into
     * the product escrow and closes bidding. Returns the removed bid.
     */
    @Transaction()
    @Returns('string')
    async ChooseConsumer(ctx: Context, capId: string, productId: string, payment: string, chosen: string): Promise<string> {
        const amount = parseArg(positiveAmount, 'payment', payment);
        const product = await this.readProduct(ctx, productId);
        await this.requireProductCap(ctx, capId, product);

        if (product.status) {
            throw new StateError(MarketErrorCodes.OUT_OF_STOCK, `a consumer was already chosen for ${productId}`);
        }
        if (amount < product.price) {
            throw new ValueError(MarketErrorCodes.INSUFFICIENT_FUNDS, `payment ${amount} is below the price ${product.price}`);
        }
        const bid = pendingBid(product, chosen);
        if (!bid) {
            throw new StateError(MarketErrorCodes.NO_SUCH_BID, `no pending bid from ${chosen} on ${productId}`);
        }
        // Quality may have changed since the bid was placed
        assertRequirementsMet(bid.requirements, product.quality, await this.readConfig(ctx));

        const client = this.getClient(ctx);
        const payer = await prepareDebit(ctx, client.id, amount);

        product.consumers = withoutBid(product, chosen);
        lockPayment(product, amount);
        product.status = true;
        product.consumer = chosen;
        product.updatedAt = this.now(ctx);

        await writeRecord(ctx, payer.id, payer);
        await writeRecord(ctx, product.id, product);
        this.logger(ctx).info(`${chosen} chosen for ${productId}, ${amount} held in escrow (${ctx.stub.getTxID()})`);
        return JSON.stringify(bid);
    }

    @Transaction()
    async SubmitOrder(ctx: Context, productId: string): Promise<void> {
        const product = await this.readProduct(ctx, productId);
        const now = this.now(ctx);

        if (now >= product.deadline) {
            throw new TimingError(MarketErrorCodes.DEADLINE_EXPIRED, `deadline of ${productId} passed at ${product.deadline}`);
        }
        if (product.consumer !== this.getClient(ctx).id) {
            throw new AuthorizationError(MarketErrorCodes.WRONG_ADDRESS, `only the chosen consumer may submit an order for ${productId}`);
        }

        product.orderSubmitted = true;
        product.updatedAt = now;

        await writeRecord(ctx, product.id, product);
        this.logger(ctx).info(`order submitted for ${productId}`);
    }

    // Releases the whole escrow to the chosen consumer
    @Transaction()
    async ConfirmOrder(ctx: Context, capId: string, productId: string): Promise<void> {
        const product = await this.readProduct(ctx, productId);
        await this.requireProductCap(ctx, capId, product);
        const now = this.now(ctx);

        if (!product.orderSubmitted) {
            throw new StateError(MarketErrorCodes.ORDER_NOT_SUBMITTED, `no order was submitted for ${productId}`);
        }
        if (now >= product.deadline) {
            throw new TimingError(MarketErrorCodes.DEADLINE_EXPIRED, `deadline of ${productId} passed at ${product.deadline}`);
        }
        const recipient = selectedConsumer(product);
        const amount = withdrawAll(product, Settlement.CONFIRMED);
        product.updatedAt = now;

        await writeRecord(ctx, product.id, product);
        await credit(ctx, recipient, amount);
        this.logger(ctx).info(`${productId} confirmed, ${amount} released to ${recipient} (${ctx.stub.getTxID()})`);
    }
}

function withoutBid(product: Product, bidder: string): Record<string, Consumer> {
    const remaining = { ...product.consumers };
    delete remaining[bidder];
    return remaining;
}
