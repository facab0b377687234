import { Context } from 'fabric-contract-api';
import { MarketErrorCodes, ValueError } from '../errors';
import { Account, accountKey } from '../models/Account';
import { readOptionalRecord, writeRecord } from './state';

export async function readAccount(ctx: Context, owner: string): Promise<Account> {
    const existing = await readOptionalRecord<Account>(ctx, accountKey(owner));
    return existing ?? { id: accountKey(owner), docType: 'account', owner, balance: 0 };
}

/**
 * Checks that `owner` can cover `amount` and returns the debited account
 * without writing it, so the caller can finish its own checks first.
 */
export async function prepareDebit(ctx: Context, owner: string, amount: number): Promise<Account> {
    const account = await readAccount(ctx, owner);
    if (account.balance < amount) {
        throw new ValueError(
            MarketErrorCodes.INSUFFICIENT_BALANCE,
            `balance ${account.balance} cannot cover ${amount}`,
        );
    }
    return { ...account, balance: account.balance - amount };
}

export async function credit(ctx: Context, owner: string, amount: number): Promise<Account> {
    const account = await readAccount(ctx, owner);
    const balance = account.balance + amount;
    if (!Number.isSafeInteger(balance)) {
        throw new ValueError(
            MarketErrorCodes.INVALID_ARGUMENT,
            `crediting ${amount} would take ${owner} past the largest representable balance`,
        );
    }
    const updated = { ...account, balance };
    await writeRecord(ctx, updated.id, updated);
    return updated;
}
