import { z } from 'zod';
import { ErrorKind, type ErrorOutcome, type LookupOutcome, type LookupResult, errorOutcome } from '../../types';

/*
 * Tolerant decode of one candidate record. Every upstream field is optional and a
 * field of the wrong type decodes as absent instead of failing the whole record.
 */
const OptionalText = z.string().refine(s => s.trim() !== '').optional().catch(undefined);

const OptionalScore = z.preprocess(
    v => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
    z.number().finite()
).optional().catch(undefined);

const OptionalList = z.array(z.unknown()).optional().catch(undefined);

const PhoneSchema = z.object({
    e164Format: OptionalText,
    carrier: OptionalText,
    type: OptionalText,
});

const AddressSchema = z.object({
    address: OptionalText,
    city: OptionalText,
    countryCode: OptionalText,
});

const InternetAddressSchema = z.object({
    id: OptionalText,
});

const SpamInfoSchema = z.object({
    spamScore: OptionalScore,
    spamType: OptionalText,
});

const CandidateSchema = z.object({
    name: OptionalText,
    phones: OptionalList,
    addresses: OptionalList,
    internetAddresses: OptionalList,
    score: OptionalScore,
    spamScore: OptionalScore,
    spamType: OptionalText,
    spamInfo: SpamInfoSchema.optional().catch(undefined),
});

export type Candidate = z.infer<typeof CandidateSchema>;

export const UNKNOWN_CARRIER = 'Unknown Carrier';
export const UNKNOWN_TYPE = 'Unknown Type';
export const NOT_SPAM = 'Not Spam';

export interface ExtractOptions {
    /** Label of the endpoint that answered. */
    source?: string;
    now?: () => Date;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function clampScore(value: number | undefined): number {
    if (value === undefined) return 0;
    return Math.min(100, Math.max(0, value));
}

function firstOf<S extends z.ZodTypeAny>(list: unknown[] | undefined, schema: S): z.infer<S> | undefined {
    if (!list || list.length === 0) return undefined;
    const parsed = schema.safeParse(list[0]);
    return parsed.success ? parsed.data : undefined;
}

function findEmail(list: unknown[] | undefined): string | undefined {
    for (const entry of list ?? []) {
        const parsed = InternetAddressSchema.safeParse(entry);
        const id = parsed.success ? parsed.data.id : undefined;
        if (id && (id.includes('@') || id.toLowerCase().includes('email'))) return id;
    }
    return undefined;
}

export class ResponseExtractor {

    /**
     * Parses a raw response body and extracts it.
     * An empty body is EMPTY_RESPONSE, a body that is not JSON is PARSE_FAILURE.
     */
    static extractFromBody(body: string, searchedNumber: string, options: ExtractOptions = {}): LookupOutcome {
        if (body.trim() === '') {
            return errorOutcome(ErrorKind.EmptyResponse, 'The lookup service returned an empty response');
        }
        let parsed: unknown;
        try {
            parsed = JSON.parse(body);
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            return errorOutcome(ErrorKind.ParseFailure, `Response is not valid JSON: ${reason}`);
        }
        return this.extract(parsed, searchedNumber, options);
    }

    /**
     * Turns a decoded response into a flat result. Only the first candidate is used.
     */
    static extract(response: unknown, searchedNumber: string, options: ExtractOptions = {}): LookupOutcome {
        if (response === null || response === undefined || response === '') {
            return errorOutcome(ErrorKind.EmptyResponse, 'The lookup service returned an empty response');
        }
        if (!isRecord(response)) {
            return errorOutcome(ErrorKind.ParseFailure, `Unexpected response shape: ${Array.isArray(response) ? 'array' : typeof response}`);
        }
        if (Object.keys(response).length === 0) {
            return errorOutcome(ErrorKind.EmptyResponse, 'The lookup service returned an empty response');
        }

        const data = response.data;
        const first = Array.isArray(data) ? data[0] : data;
        if (!isRecord(first)) {
            return errorOutcome(ErrorKind.NoData, 'No data available for this number');
        }

        const decoded = CandidateSchema.safeParse(first);
        if (!decoded.success) {
            return errorOutcome(ErrorKind.NoData, 'No data available for this number');
        }
        return this.toResult(decoded.data, searchedNumber, options);
    }

    private static toResult(candidate: Candidate, searchedNumber: string, options: ExtractOptions): LookupResult | ErrorOutcome {
        const phone = firstOf(candidate.phones, PhoneSchema);
        const address = firstOf(candidate.addresses, AddressSchema);
        const email = findEmail(candidate.internetAddresses);

        const informative = Boolean(candidate.name || phone?.carrier || address?.city || address?.address || email);
        if (!informative) {
            return errorOutcome(ErrorKind.NoIdentifiableInfo, 'No identifiable information found');
        }

        const hasPhones = (candidate.phones?.length ?? 0) > 0;
        const now = options.now ? options.now() : new Date();

        const result: LookupResult = {
            status: 'OK',
            searched_number: searchedNumber,
            confidence_score: clampScore(candidate.score),
            spam_score: clampScore(candidate.spamScore ?? candidate.spamInfo?.spamScore),
            spam_type: candidate.spamType ?? candidate.spamInfo?.spamType ?? NOT_SPAM,
            source: options.source ?? 'unknown',
            timestamp: now.toISOString(),
        };

        if (candidate.name) result.name = candidate.name;
        if (phone?.e164Format) result.phone = phone.e164Format;
        if (hasPhones) {
            result.carrier = phone?.carrier ?? UNKNOWN_CARRIER;
            result.number_type = phone?.type ?? UNKNOWN_TYPE;
        }
        if (address?.city) result.city = address.city;
        if (address?.address) result.address = address.address;
        if (address?.countryCode) result.country_code = address.countryCode;
        if (email) result.email = email;

        return result;
    }
}
