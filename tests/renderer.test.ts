import { describe, expect, it } from 'vitest';
import { Renderer, displayNumber } from '../src/modules/renderer';
import { type BatchResult, ErrorKind, type LookupResult, errorOutcome } from '../src/types';

const plain = new Renderer(false);

const result: LookupResult = {
    status: 'OK',
    searched_number: '+12025550123',
    name: 'Alice',
    carrier: 'Acme',
    number_type: 'MOBILE',
    city: 'Washington',
    confidence_score: 85,
    spam_score: 50,
    spam_type: 'Not Spam',
    source: 'primary.test',
    timestamp: '2026-01-02T03:04:05.000Z',
};

describe('Renderer', () => {
    it('renders a result card with only the fields present', () => {
        expect(plain.result(result, '2025550123')).toEqual([
            '=== LOOKUP RESULT ===',
            'Phone: +1 202 555 0123',
            'Name: Alice',
            'Carrier: Acme',
            'Type: MOBILE',
            'Location: Washington',
            'Spam Score: 50 - MEDIUM SPAM',
            'Spam Type: Not Spam',
            'Confidence Score: 85 (HIGH)',
            'Source: primary.test',
            '='.repeat(40),
        ]);
    });

    it('labels spam and confidence bands', () => {
        const lines = plain.result({ ...result, spam_score: 71, confidence_score: 60 }, 'x');
        expect(lines).toContain('Spam Score: 71 - HIGH SPAM');
        expect(lines).toContain('Confidence Score: 60 (LOW)');
    });

    it('renders errors on one line', () => {
        expect(plain.result(errorOutcome(ErrorKind.UpstreamError, 'Lookup service returned status 503', 503), '017')).toEqual([
            '[✗] 017: Lookup service error (status 503)',
        ]);
        expect(plain.result(errorOutcome(ErrorKind.InvalidInput, 'too short'), '+1')).toEqual([
            '[✗] +1: Invalid phone number (too short)',
        ]);
    });

    it('colours messages only when asked to', () => {
        expect(plain.message('success', 'done')).toBe('[✓] done');
        expect(new Renderer(true).message('success', 'done')).toBe('\x1b[32m[✓] done\x1b[0m');
        expect(new Renderer(true).heading('X')).toBe('\x1b[33m=== X ===\x1b[0m');
    });

    it('summarises a batch before its entries', () => {
        const batch: BatchResult = {
            country: 'BD',
            entries: [
                { input: '12', outcome: errorOutcome(ErrorKind.InvalidInput, 'length out of range') },
                { input: '01712345678', outcome: errorOutcome(ErrorKind.NumberNotFound, 'Number not found by the lookup service') },
            ],
            total: 2,
            successful_count: 0,
            failed_count: 2,
            cancelled: true,
            started_at: '2026-01-02T03:04:05.000Z',
            finished_at: '2026-01-02T03:04:05.000Z',
        };
        expect(plain.batch(batch)).toEqual([
            '=== BULK SEARCH SUMMARY ===',
            'Successful: 0',
            'Failed: 2',
            'Total: 2',
            '[!] Batch cancelled before every number was looked up',
            '',
            '[✗] 12: Invalid phone number (length out of range)',
            '',
            '[✗] 01712345678: Number not found',
        ]);
    });

    it('lists countries, endpoint status and saved files', () => {
        expect(plain.countries([{ code: 'BD', name: 'Bangladesh', calling_code: '880' }])).toEqual([
            '=== SUPPORTED COUNTRY CODES ===',
            'BD: Bangladesh (+880)',
        ]);
        expect(plain.status([
            { url: 'https://primary.test/v2/search', reachable: true, http_status: 401, latency_ms: 12 },
            { url: 'https://fallback-1.test/v2/search', reachable: false, latency_ms: 3, error: 'Connection failed' },
        ])).toEqual([
            '[✓] https://primary.test/v2/search reachable (HTTP 401, 12 ms)',
            '[✗] https://fallback-1.test/v2/search not reachable: Connection failed',
        ]);
        expect(plain.savedList([])).toEqual(['[!] No saved results found!']);
        expect(plain.savedList(['b.json', 'a.json'])).toEqual(['=== SAVED RESULTS (2 files) ===', '1. b.json', '2. a.json']);
    });

    it('falls back to the raw number when it cannot be formatted', () => {
        expect(displayNumber('+12025550123')).toBe('+1 202 555 0123');
        expect(displayNumber('+0212345678')).toBe('+0212345678');
    });
});
