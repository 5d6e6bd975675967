import { parsePhoneNumberFromString } from 'libphonenumber-js';
import { type BatchResult, type CountryInfo, type EndpointStatus, ErrorKind, type ErrorOutcome, type LookupOutcome, type LookupResult } from '../../types';
import { Scorer } from '../scorer';

const ANSI = {
    green: '\x1b[32m',
    red: '\x1b[31m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    cyan: '\x1b[36m',
    magenta: '\x1b[35m',
    reset: '\x1b[0m',
} as const;

type Color = Exclude<keyof typeof ANSI, 'reset'>;
export type MessageType = 'success' | 'error' | 'warning' | 'info';

const MESSAGE_STYLE: Record<MessageType, { color: Color; symbol: string }> = {
    success: { color: 'green', symbol: '[✓]' },
    error: { color: 'red', symbol: '[✗]' },
    warning: { color: 'yellow', symbol: '[!]' },
    info: { color: 'blue', symbol: '[i]' },
};

const ERROR_TEXT: Record<ErrorKind, (outcome: ErrorOutcome) => string> = {
    [ErrorKind.InvalidInput]: o => `Invalid phone number (${o.message})`,
    [ErrorKind.EmptyResponse]: () => 'The lookup service returned an empty response',
    [ErrorKind.NoData]: () => 'No results found',
    [ErrorKind.NoIdentifiableInfo]: () => 'No identifiable information found',
    [ErrorKind.NumberNotFound]: () => 'Number not found',
    [ErrorKind.RateLimited]: () => 'Rate limited, wait a while before trying again',
    [ErrorKind.UpstreamError]: o => `Lookup service error (status ${o.http_status ?? 'unknown'})`,
    [ErrorKind.Unreachable]: () => 'Lookup service unreachable, check your internet connection',
    [ErrorKind.ParseFailure]: () => 'Could not parse the lookup service response',
    [ErrorKind.Unexpected]: o => `Unexpected error: ${o.message}`,
};

const RULE = '='.repeat(40);

/** International display format, or the number unchanged when it cannot be parsed. */
export function displayNumber(number: string): string {
    const parsed = parsePhoneNumberFromString(number);
    return parsed ? parsed.formatInternational() : number;
}

export class Renderer {
    constructor(private readonly color: boolean) {}

    paint(color: Color, text: string): string {
        return this.color ? `${ANSI[color]}${text}${ANSI.reset}` : text;
    }

    message(type: MessageType, text: string): string {
        const style = MESSAGE_STYLE[type];
        return this.paint(style.color, `${style.symbol} ${text}`);
    }

    heading(text: string): string {
        return this.paint('yellow', `=== ${text} ===`);
    }

    describeError(outcome: ErrorOutcome): string {
        return ERROR_TEXT[outcome.kind](outcome);
    }

    result(outcome: LookupOutcome, label: string): string[] {
        if (outcome.status === 'ERROR') {
            return [this.message('error', `${label}: ${this.describeError(outcome)}`)];
        }
        return this.resultCard(outcome);
    }

    private field(name: string, value: string): string {
        return `${this.paint('blue', `${name}:`)} ${value}`;
    }

    private resultCard(result: LookupResult): string[] {
        const lines = [this.paint('green', '=== LOOKUP RESULT ===')];
        lines.push(this.field('Phone', displayNumber(result.searched_number)));

        const optional: Array<[string, string | undefined]> = [
            ['Name', result.name],
            ['Carrier', result.carrier],
            ['Type', result.number_type],
            ['Location', result.city],
            ['Address', result.address],
            ['Country', result.country_code],
            ['Email', result.email],
        ];
        for (const [name, value] of optional) {
            if (value) lines.push(this.field(name, value));
        }

        const spam = Scorer.spamBand(result.spam_score);
        const spamText = spam === 'HIGH'
            ? this.paint('red', 'HIGH SPAM')
            : spam === 'MEDIUM' ? this.paint('yellow', 'MEDIUM SPAM') : this.paint('green', 'CLEAN');
        lines.push(this.field('Spam Score', `${result.spam_score} - ${spamText}`));
        lines.push(this.field('Spam Type', result.spam_type));

        const confidence = Scorer.confidenceBand(result.confidence_score);
        const confidenceColor: Color = confidence === 'HIGH' ? 'green' : confidence === 'MEDIUM' ? 'yellow' : 'red';
        lines.push(this.field('Confidence Score', this.paint(confidenceColor, `${result.confidence_score} (${confidence})`)));
        lines.push(this.field('Source', result.source));
        lines.push(this.paint('green', RULE));
        return lines;
    }

    batchSummary(batch: BatchResult): string[] {
        const lines = [
            this.paint('green', '=== BULK SEARCH SUMMARY ==='),
            this.paint('green', `Successful: ${batch.successful_count}`),
            this.paint('red', `Failed: ${batch.failed_count}`),
            this.paint('blue', `Total: ${batch.total}`),
        ];
        if (batch.cancelled) lines.push(this.message('warning', 'Batch cancelled before every number was looked up'));
        return lines;
    }

    batch(batch: BatchResult): string[] {
        const lines = this.batchSummary(batch);
        for (const entry of batch.entries) {
            lines.push('', ...this.result(entry.outcome, entry.input));
        }
        return lines;
    }

    countries(countries: CountryInfo[]): string[] {
        return [
            this.heading('SUPPORTED COUNTRY CODES'),
            ...countries.map(c => `${this.paint('green', `${c.code}:`)} ${c.name} (+${c.calling_code})`),
        ];
    }

    status(statuses: EndpointStatus[]): string[] {
        return statuses.map(s => s.reachable
            ? this.message('success', `${s.url} reachable (HTTP ${s.http_status ?? '?'}, ${s.latency_ms} ms)`)
            : this.message('error', `${s.url} not reachable: ${s.error ?? 'unknown error'}`));
    }

    savedList(files: string[]): string[] {
        if (files.length === 0) return [this.message('warning', 'No saved results found!')];
        return [
            this.heading(`SAVED RESULTS (${files.length} files)`),
            ...files.map((f, i) => `${this.paint('green', `${i + 1}.`)} ${f}`),
        ];
    }
}
