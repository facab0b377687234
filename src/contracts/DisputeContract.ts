import { Context, Info, Returns, Transaction } from 'fabric-contract-api';
import {
    AuthorizationError,
    MarketErrorCodes,
    StateError,
    TimingError
} from '../errors';
import { credit } from '../ledger/accounts';
import { withdrawAll } from '../ledger/escrow';
import { readRecord, writeRecord } from '../ledger/state';
import { Complaint } from '../models/Complaint';
import { selectedConsumer, Settlement } from '../models/Product';
import { nonEmptyText, parseArg } from '../validation';
import { BaseContract } from './BaseContract';

@Info({ title: 'DisputeContract', description: 'Complaints after the deadline and arbitrated escrow release' })
export class DisputeContract extends BaseContract {
    constructor() {
        super('DisputeContract');
    }

    /**
     * Opens a dispute on a product whose fulfillment window has closed. Only
     * the supplier or the chosen consumer may file. Escrow stays locked until
     * the arbitrator resolves it.
     */
    @Transaction()
    @Returns('string')
    async FileComplaint(ctx: Context, productId: string, reason: string): Promise<string> {
        const text = parseArg(nonEmptyText, 'reason', reason);
        const product = await this.readProduct(ctx, productId);
        const client = this.getClient(ctx);
        const now = this.now(ctx);

        if (now <= product.deadline) {
            throw new TimingError(MarketErrorCodes.DEADLINE_NOT_REACHED, `complaints on ${productId} open after ${product.deadline}`);
        }
        if (client.id !== product.supplier && client.id !== product.consumer) {
            throw new AuthorizationError(MarketErrorCodes.INCORRECT_SUPPLIER, `caller is not a party to ${productId}`);
        }
        const consumer = selectedConsumer(product);
        if (product.dispute) {
            throw new StateError(MarketErrorCodes.DISPUTE_ALREADY_OPEN, `${productId} already has an open complaint`);
        }
        if (product.payment <= 0 || product.settlement !== null) {
            throw new StateError(MarketErrorCodes.ESCROW_EMPTY, `escrow of ${productId} was already released`);
        }

        const complaint: Complaint = {
            id: `COMPLAINT_${ctx.stub.getTxID()}`,
            docType: 'complaint',
            productId: product.id,
            consumer,
            supplier: product.supplier,
            complainant: client.id,
            reason: text,
            decision: false,
            resolved: false,
            createdAt: now
        };
        product.dispute = true;
        product.updatedAt = now;

        await writeRecord(ctx, complaint.id, complaint);
        await writeRecord(ctx, product.id, product);
        this.logger(ctx).info(`${complaint.id} filed against ${productId} by ${client.id}`);
        return JSON.stringify(complaint);
    }

    @Transaction(false)
    @Returns('string')
    async ReadComplaint(ctx: Context, complaintId: string): Promise<string> {
        const complaint = await readRecord<Complaint>(ctx, 'Complaint', complaintId, 'complaint');
        return JSON.stringify(complaint);
    }

    @Transaction()
    @Returns('string')
    async ResolveDisputeForConsumer(ctx: Context, adminCapId: string, complaintId: string): Promise<string> {
        return this.resolve(ctx, adminCapId, complaintId, true);
    }

    @Transaction()
    @Returns('string')
    async ResolveDisputeForSupplier(ctx: Context, adminCapId: string, complaintId: string): Promise<string> {
        return this.resolve(ctx, adminCapId, complaintId, false);
    }

    // Both outcomes drain the whole escrow, so only the first resolution can succeed
    private async resolve(ctx: Context, adminCapId: string, complaintId: string, forConsumer: boolean): Promise<string> {
        await this.requireAdminCap(ctx, adminCapId);
        const complaint = await readRecord<Complaint>(ctx, 'Complaint', complaintId, 'complaint');
        const product = await this.readProduct(ctx, complaint.productId);

        if (!product.dispute || complaint.resolved) {
            throw new StateError(MarketErrorCodes.DISPUTE_FALSE, `${complaint.productId} has no open dispute`);
        }

        const now = this.now(ctx);
        const recipient = forConsumer ? complaint.consumer : product.supplier;
        const amount = withdrawAll(
            product,
            forConsumer ? Settlement.RESOLVED_FOR_CONSUMER : Settlement.RESOLVED_FOR_SUPPLIER,
        );
        product.dispute = false;
        product.updatedAt = now;

        const resolved: Complaint = { ...complaint, decision: forConsumer, resolved: true, resolvedAt: now };

        await writeRecord(ctx, product.id, product);
        await writeRecord(ctx, resolved.id, resolved);
        await credit(ctx, recipient, amount);
        this.logger(ctx).info(`${complaintId} resolved for ${forConsumer ? 'consumer' : 'supplier'}, ${amount} released to ${recipient}`);
        return JSON.stringify(resolved);
    }
}
