export enum ErrorKind {
    InvalidInput = 'INVALID_INPUT',
    EmptyResponse = 'EMPTY_RESPONSE',
    NoData = 'NO_DATA',
    NoIdentifiableInfo = 'NO_IDENTIFIABLE_INFO',
    NumberNotFound = 'NUMBER_NOT_FOUND',
    RateLimited = 'RATE_LIMITED',
    UpstreamError = 'UPSTREAM_ERROR',
    Unreachable = 'UNREACHABLE',
    ParseFailure = 'PARSE_FAILURE',
    Unexpected = 'UNEXPECTED',
}

export type ErrorOutcome = {
    status: 'ERROR';
    kind: ErrorKind;
    message: string;
    http_status?: number; // only for UPSTREAM_ERROR
};

export type LookupResult = {
    status: 'OK';
    searched_number: string;
    name?: string;
    phone?: string; // E.164 as reported upstream
    carrier?: string;
    number_type?: string;
    city?: string;
    address?: string;
    country_code?: string;
    email?: string;
    confidence_score: number; // 0-100
    spam_score: number; // 0-100
    spam_type: string;
    source: string;
    timestamp: string; // ISO 8601
};

export type LookupOutcome = LookupResult | ErrorOutcome;

export type NormalizedNumber = {
    status: 'OK';
    number: string; // +<country code><subscriber>
};

export type BatchEntry = {
    readonly input: string;
    readonly outcome: LookupOutcome;
};

export type BatchResult = {
    readonly country: string;
    readonly entries: readonly BatchEntry[];
    readonly total: number;
    readonly successful_count: number;
    readonly failed_count: number;
    readonly cancelled: boolean;
    readonly started_at: string;
    readonly finished_at: string;
};

export type CountryInfo = {
    code: string;
    name: string;
    calling_code: string;
};

export type EndpointStatus = {
    url: string;
    reachable: boolean;
    http_status?: number;
    latency_ms: number;
    error?: string;
};

/** Body POSTed to the lookup service. */
export type SearchPayload = {
    query: string;
    countryCode: string;
    type: string;
    placement: string;
    encoding: 'json';
};

export function isErrorOutcome(value: { status: 'OK' | 'ERROR' }): value is ErrorOutcome {
    return value.status === 'ERROR';
}

export function errorOutcome(kind: ErrorKind, message: string, httpStatus?: number): ErrorOutcome {
    const outcome: ErrorOutcome = { status: 'ERROR', kind, message };
    if (httpStatus !== undefined) outcome.http_status = httpStatus;
    return outcome;
}
