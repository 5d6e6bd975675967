import { type CountryInfo, ErrorKind, type ErrorOutcome, type NormalizedNumber, errorOutcome } from '../../types';

type CountryRule = CountryInfo & {
    hasTrunkZero: boolean;
    subscriberLength: number;
    domestic: RegExp; // leading digits of a subscriber number written without the trunk 0
};

const COUNTRIES: CountryRule[] = [
    { code: 'BD', name: 'Bangladesh', calling_code: '880', hasTrunkZero: true, subscriberLength: 10, domestic: /^1[3-9]/ },
    { code: 'IN', name: 'India', calling_code: '91', hasTrunkZero: true, subscriberLength: 10, domestic: /^[6-9]/ },
    { code: 'US', name: 'United States', calling_code: '1', hasTrunkZero: false, subscriberLength: 10, domestic: /^[2-9]/ },
    { code: 'CA', name: 'Canada', calling_code: '1', hasTrunkZero: false, subscriberLength: 10, domestic: /^[2-9]/ },
    { code: 'UK', name: 'United Kingdom', calling_code: '44', hasTrunkZero: true, subscriberLength: 10, domestic: /^7/ },
    { code: 'AE', name: 'United Arab Emirates', calling_code: '971', hasTrunkZero: true, subscriberLength: 9, domestic: /^5/ },
    { code: 'SA', name: 'Saudi Arabia', calling_code: '966', hasTrunkZero: true, subscriberLength: 9, domestic: /^5/ },
    { code: 'PK', name: 'Pakistan', calling_code: '92', hasTrunkZero: true, subscriberLength: 10, domestic: /^3/ },
    { code: 'AU', name: 'Australia', calling_code: '61', hasTrunkZero: true, subscriberLength: 9, domestic: /^4/ },
    { code: 'SG', name: 'Singapore', calling_code: '65', hasTrunkZero: false, subscriberLength: 8, domestic: /^[689]/ },
];

const ALIASES: Record<string, string> = { GB: 'UK' };

export const MIN_NORMALIZED_LENGTH = 10;
export const MAX_NORMALIZED_LENGTH = 15;
const MIN_INTERNATIONAL_DIGITS = 7;

function invalid(message: string): ErrorOutcome {
    return errorOutcome(ErrorKind.InvalidInput, message);
}

function findRule(hint: string): CountryRule | undefined {
    const code = hint.trim().toUpperCase();
    const resolved = ALIASES[code] ?? code;
    return COUNTRIES.find(c => c.code === resolved);
}

export class Normalizer {

    /**
     * Rewrites a raw phone number into `+<country code><subscriber>` form.
     * Only the documented local formats of the hinted country are rewritten;
     * anything else just gets a `+` in front.
     */
    static normalize(raw: string, countryHint: string): NormalizedNumber | ErrorOutcome {
        const stripped = this.strip(raw);
        if (stripped === '' || stripped === '+') return invalid('empty number');

        let candidate: string;
        if (stripped.startsWith('+')) {
            if (stripped.length - 1 < MIN_INTERNATIONAL_DIGITS) return invalid('too short');
            candidate = stripped;
        } else {
            candidate = this.applyCountryRules(stripped, findRule(countryHint));
        }

        if (candidate.length < MIN_NORMALIZED_LENGTH || candidate.length > MAX_NORMALIZED_LENGTH) {
            return invalid('length out of range');
        }
        return { status: 'OK', number: candidate };
    }

    /** Keeps ASCII digits and a leading `+`. */
    static strip(raw: string): string {
        const trimmed = raw.trim();
        const digits = trimmed.replace(/[^0-9]/g, '');
        return trimmed.startsWith('+') ? '+' + digits : digits;
    }

    private static applyCountryRules(digits: string, rule: CountryRule | undefined): string {
        if (rule) {
            if (rule.hasTrunkZero
                && digits.startsWith('0')
                && digits.length === rule.subscriberLength + 1
                && rule.domestic.test(digits.substring(1))) {
                return `+${rule.calling_code}${digits.substring(1)}`;
            }
            if (digits.length === rule.subscriberLength && rule.domestic.test(digits)) {
                return `+${rule.calling_code}${digits}`;
            }
        }
        return '+' + digits;
    }

    static resolveCountry(hint: string): CountryInfo | undefined {
        const rule = findRule(hint);
        return rule ? { code: rule.code, name: rule.name, calling_code: rule.calling_code } : undefined;
    }

    static listCountries(): CountryInfo[] {
        return COUNTRIES.map(({ code, name, calling_code }) => ({ code, name, calling_code }));
    }
}
