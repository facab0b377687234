import { Context, Info, Returns, Transaction } from 'fabric-contract-api';
import { MarketErrorCodes, ValueError } from '../errors';
import { credit, prepareDebit, readAccount } from '../ledger/accounts';
import { writeRecord } from '../ledger/state';
import { nonEmptyText, parseArg, positiveAmount } from '../validation';
import { BaseContract } from './BaseContract';

@Info({ title: 'WalletContract', description: 'Balances used to fund and receive escrow' })
export class WalletContract extends BaseContract {
    constructor() {
        super('WalletContract');
    }

    // Seeds an account; only the arbitrator may issue funds
    @Transaction()
    @Returns('string')
    async MintFunds(ctx: Context, adminCapId: string, recipient: string, amount: string): Promise<string> {
        const owner = parseArg(nonEmptyText, 'recipient', recipient);
        const value = parseArg(positiveAmount, 'amount', amount);
        await this.requireAdminCap(ctx, adminCapId);

        const account = await credit(ctx, owner, value);
        this.logger(ctx).info(`minted ${value} to ${owner} in ${ctx.stub.getTxID()}`);
        return JSON.stringify(account);
    }

    @Transaction()
    async Transfer(ctx: Context, recipient: string, amount: string): Promise<void> {
        const to = parseArg(nonEmptyText, 'recipient', recipient);
        const value = parseArg(positiveAmount, 'amount', amount);
        const client = this.getClient(ctx);
        if (to === client.id) {
            throw new ValueError(MarketErrorCodes.INVALID_ARGUMENT, 'recipient must differ from the sender');
        }

        const debited = await prepareDebit(ctx, client.id, value);
        await writeRecord(ctx, debited.id, debited);
        await credit(ctx, to, value);
        this.logger(ctx).info(`transferred ${value} from ${client.id} to ${to} in ${ctx.stub.getTxID()}`);
    }

    @Transaction(false)
    @Returns('string')
    async ReadBalance(ctx: Context, owner: string): Promise<string> {
        const account = await readAccount(ctx, owner || this.getClient(ctx).id);
        return JSON.stringify(account);
    }
}
