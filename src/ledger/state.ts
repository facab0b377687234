import { Context } from 'fabric-contract-api';
import { NotFoundError } from '../errors';

export async function recordExists(ctx: Context, key: string): Promise<boolean> {
    const data = await ctx.stub.getState(key);
    return !!data && data.length > 0;
}

/**
 * Loads a JSON record and checks it is of the expected `docType`. A key that
 * holds some other kind of record is reported as missing.
 */
export async function readRecord<T extends { docType: string }>(
    ctx: Context,
    kind: string,
    key: string,
    docType: T['docType'],
): Promise<T> {
    const data = await ctx.stub.getState(key);
    if (!data || data.length === 0) throw new NotFoundError(kind, key);
    const record: T | null = JSON.parse(Buffer.from(data).toString('utf8'));
    if (!record || record.docType !== docType) throw new NotFoundError(kind, key);
    return record;
}

export async function readOptionalRecord<T>(ctx: Context, key: string): Promise<T | undefined> {
    const data = await ctx.stub.getState(key);
    if (!data || data.length === 0) return undefined;
    const record: T = JSON.parse(Buffer.from(data).toString('utf8'));
    return record;
}

export async function writeRecord(ctx: Context, key: string, record: object): Promise<void> {
    await ctx.stub.putState(key, Buffer.from(JSON.stringify(record)));
}

// Transaction timestamp in epoch seconds; the only clock the contracts use.
export function txSeconds(ctx: Context): number {
    return Math.floor(ctx.stub.getDateTimestamp().getTime() / 1000);
}
