import 'reflect-metadata';
import { Context, Contract } from 'fabric-contract-api';
import { CONFIG_KEY, DEFAULT_CONFIG, MarketConfig } from '../config';
import { AuthorizationError, MarketErrorCodes } from '../errors';
import { readOptionalRecord, readRecord, txSeconds } from '../ledger/state';
import { ADMIN_CAP_ID, AdminCap, ProductCap } from '../models/Capability';
import { Product } from '../models/Product';

export class BaseContract extends Contract {
    constructor(name: string) {
        super(name);
    }

    // Helper: Get Client Identity
    protected getClient(ctx: Context) {
        const cid = ctx.clientIdentity;
        return {
            id: cid.getID(),
            mspId: cid.getMSPID()
        };
    }

    protected logger(ctx: Context) {
        return ctx.logging.getLogger(this.getName());
    }

    protected now(ctx: Context): number {
        return txSeconds(ctx);
    }

    protected async readConfig(ctx: Context): Promise<MarketConfig> {
        return (await readOptionalRecord<MarketConfig>(ctx, CONFIG_KEY)) ?? DEFAULT_CONFIG;
    }

    protected async readProduct(ctx: Context, productId: string): Promise<Product> {
        return readRecord<Product>(ctx, 'Product', productId, 'product');
    }

    // Helper: the caller must hold the cap and it must be bound to this product
    protected async requireProductCap(ctx: Context, capId: string, product: Product): Promise<ProductCap> {
        const cap = await readRecord<ProductCap>(ctx, 'ProductCap', capId, 'productCap');
        const client = this.getClient(ctx);
        if (cap.productId !== product.id || cap.owner !== client.id) {
            throw new AuthorizationError(
                MarketErrorCodes.INVALID_CAPABILITY,
                `capability ${capId} does not grant control of ${product.id}`,
            );
        }
        return cap;
    }

    protected async requireAdminCap(ctx: Context, capId: string): Promise<AdminCap> {
        const cap = capId === ADMIN_CAP_ID
            ? await readOptionalRecord<AdminCap>(ctx, ADMIN_CAP_ID)
            : undefined;
        if (!cap || cap.owner !== this.getClient(ctx).id) {
            throw new AuthorizationError(MarketErrorCodes.NOT_ADMIN, 'caller does not hold the admin capability');
        }
        return cap;
    }
}
