import { MarketConfig } from '../config';
import { MarketErrorCodes, ValueError } from '../errors';

/** Returns the requirement tags a product of the given quality cannot satisfy. */
export function unmetRequirements(requirements: readonly string[], quality: number, config: MarketConfig): string[] {
    return requirements.filter((tag) => {
        const minimum = config.qualityRules[tag];
        return minimum !== undefined && quality < minimum;
    });
}

export function assertRequirementsMet(requirements: readonly string[], quality: number, config: MarketConfig): void {
    const unmet = unmetRequirements(requirements, quality, config);
    if (unmet.length > 0) {
        throw new ValueError(
            MarketErrorCodes.REQUIREMENTS_NOT_MET,
            `quality ${quality} does not satisfy ${unmet.map((tag) => `${tag} (>= ${config.qualityRules[tag]})`).join(', ')}`,
        );
    }
}
