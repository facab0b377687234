import { z, ZodType } from 'zod';
import { MarketErrorCodes, ValueError } from './errors';

// Transaction arguments always arrive as strings.
const integerString = z.string().trim().regex(/^-?\d+$/, 'must be an integer')
    .transform(Number)
    .refine(Number.isSafeInteger, 'is out of range');

export const positiveAmount = integerString.refine((n) => n > 0, 'must be positive');

export const qualityScore = integerString;

export const boundedQualityScore = integerString.refine((n) => n >= 0 && n <= 100, 'must be between 0 and 100');

export const nonEmptyText = z.string().trim().min(1, 'must not be empty');

export const requirementTags = z.array(z.string().trim().min(1, 'tags must not be empty'))
    // Set semantics, first occurrence wins
    .transform((tags) => Array.from(new Set(tags)));

export function parseArg<T>(schema: ZodType<T, z.ZodTypeDef, string>, name: string, value: string): T {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw new ValueError(MarketErrorCodes.INVALID_ARGUMENT, `${name} ${result.error.issues[0].message}`);
    }
    return result.data;
}

export function parseRequirements(json: string): string[] {
    let raw: unknown;
    try {
        raw = JSON.parse(json || '[]');
    } catch {
        throw new ValueError(MarketErrorCodes.INVALID_ARGUMENT, 'requirements must be a JSON array of strings');
    }
    const result = requirementTags.safeParse(raw);
    if (!result.success) {
        throw new ValueError(MarketErrorCodes.INVALID_ARGUMENT, 'requirements must be a JSON array of strings');
    }
    return result.data;
}
