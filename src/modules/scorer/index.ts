export type SpamBand = 'HIGH' | 'MEDIUM' | 'CLEAN';
export type ConfidenceBand = 'HIGH' | 'MEDIUM' | 'LOW';

// Display policy. Boundaries are inclusive on the lower band: 70 is MEDIUM, 40 is CLEAN.
export const SPAM_HIGH_ABOVE = 70;
export const SPAM_MEDIUM_ABOVE = 40;
export const CONFIDENCE_HIGH_ABOVE = 80;
export const CONFIDENCE_MEDIUM_ABOVE = 60;

export class Scorer {
    static spamBand(spamScore: number): SpamBand {
        if (spamScore > SPAM_HIGH_ABOVE) return 'HIGH';
        if (spamScore > SPAM_MEDIUM_ABOVE) return 'MEDIUM';
        return 'CLEAN';
    }

    static confidenceBand(score: number): ConfidenceBand {
        if (score > CONFIDENCE_HIGH_ABOVE) return 'HIGH';
        if (score > CONFIDENCE_MEDIUM_ABOVE) return 'MEDIUM';
        return 'LOW';
    }
}
