import { Context, Info, Returns, Transaction } from 'fabric-contract-api';
import { CONFIG_KEY, parseMarketConfig } from '../config';
import { MarketErrorCodes, StateError } from '../errors';
import { readRecord, recordExists, writeRecord } from '../ledger/state';
import { ADMIN_CAP_ID, AdminCap } from '../models/Capability';
import { nonEmptyText, parseArg } from '../validation';
import { BaseContract } from './BaseContract';

@Info({ title: 'AdminContract', description: 'Arbitrator bootstrap and market configuration' })
export class AdminContract extends BaseContract {
    constructor() {
        super('AdminContract');
    }

    /**
     * Mints the single admin capability for the caller and stores the market
     * configuration. Runs once per channel.
     */
    @Transaction()
    @Returns('string')
    async Initialize(ctx: Context, configJson: string): Promise<string> {
        if (await recordExists(ctx, ADMIN_CAP_ID)) {
            throw new StateError(MarketErrorCodes.ALREADY_INITIALIZED, 'admin capability was already minted');
        }
        const config = parseMarketConfig(configJson);
        const client = this.getClient(ctx);

        const cap: AdminCap = {
            id: ADMIN_CAP_ID,
            docType: 'adminCap',
            owner: client.id,
            createdAt: this.now(ctx)
        };

        await writeRecord(ctx, ADMIN_CAP_ID, cap);
        await writeRecord(ctx, CONFIG_KEY, config);
        this.logger(ctx).info(`admin capability minted for ${client.id} (${client.mspId}) in ${ctx.stub.getTxID()}`);
        return JSON.stringify(cap);
    }

    @Transaction(false)
    @Returns('string')
    async ReadAdminCap(ctx: Context): Promise<string> {
        const cap = await readRecord<AdminCap>(ctx, 'AdminCap', ADMIN_CAP_ID, 'adminCap');
        return JSON.stringify(cap);
    }

    @Transaction()
    async TransferAdminCap(ctx: Context, newOwner: string): Promise<void> {
        const owner = parseArg(nonEmptyText, 'newOwner', newOwner);
        const cap = await this.requireAdminCap(ctx, ADMIN_CAP_ID);

        await writeRecord(ctx, ADMIN_CAP_ID, { ...cap, owner });
        this.logger(ctx).info(`admin capability transferred to ${owner} in ${ctx.stub.getTxID()}`);
    }

    @Transaction()
    async UpdateConfig(ctx: Context, configJson: string): Promise<void> {
        await this.requireAdminCap(ctx, ADMIN_CAP_ID);
        const config = parseMarketConfig(configJson);

        await writeRecord(ctx, CONFIG_KEY, config);
        this.logger(ctx).info(`market config updated in ${ctx.stub.getTxID()}`);
    }

    @Transaction(false)
    @Returns('string')
    async ReadConfig(ctx: Context): Promise<string> {
        return JSON.stringify(await this.readConfig(ctx));
    }
}
