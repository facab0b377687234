import { z } from 'zod';
import { MarketErrorCodes, ValueError } from './errors';

export const CONFIG_KEY = 'CONFIG';

export const marketConfigSchema = z.object({
    // When false, any integer quality is accepted at listing time
    enforceQualityRange: z.boolean().default(true),
    // Requirement tag -> minimum product quality
    qualityRules: z.record(z.string().min(1), z.number().int().min(0).max(100))
        .default({ high_quality: 80 }),
}).strict();

export type MarketConfig = z.infer<typeof marketConfigSchema>;

export const DEFAULT_CONFIG: MarketConfig = marketConfigSchema.parse({});

export function parseMarketConfig(json: string): MarketConfig {
    let raw: unknown;
    try {
        raw = JSON.parse(json || '{}');
    } catch (e) {
        throw new ValueError(MarketErrorCodes.INVALID_ARGUMENT, `config is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
    const result = marketConfigSchema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new ValueError(
            MarketErrorCodes.INVALID_ARGUMENT,
            `invalid config at "${issue.path.join('.')}": ${issue.message}`,
        );
    }
    return result.data;
}
