import fs from 'fs';
import { z } from 'zod';
import { ConfigurationError } from '../../utils/errors';
import type { Transport, TransportRequest, TransportResponse } from './index';

export type MockHandler = (request: TransportRequest) => TransportResponse | Promise<TransportResponse>;

const DirectorySchema = z.record(z.string(), z.record(z.string(), z.unknown()));

/**
 * In-process stand-in for the lookup service. Every request is recorded in `requests`.
 */
export class MockTransport implements Transport {
    readonly requests: TransportRequest[] = [];

    constructor(private readonly handler: MockHandler) {}

    async send(request: TransportRequest): Promise<TransportResponse> {
        this.requests.push(request);
        return this.handler(request);
    }

    /**
     * Answers from a directory of canned candidate records keyed by normalized number.
     * Unknown numbers get a 404.
     */
    static fromDirectory(directory: Record<string, Record<string, unknown>>): MockTransport {
        return new MockTransport(request => {
            const candidate = directory[request.body.query];
            if (!candidate) return { status: 404, body: JSON.stringify({ message: 'Not found' }) };
            return { status: 200, body: JSON.stringify({ data: [candidate] }) };
        });
    }

    static fromFile(filePath: string): MockTransport {
        let parsed: unknown;
        try {
            parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            throw new ConfigurationError(`Cannot load mock directory ${filePath}: ${reason}`);
        }
        const directory = DirectorySchema.safeParse(parsed);
        if (!directory.success) {
            throw new ConfigurationError(
                `Mock directory ${filePath} must map numbers to candidate objects`,
                directory.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
            );
        }
        return this.fromDirectory(directory.data);
    }
}
