import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { SearchPayload } from '../../types';
import { TransportError } from '../../utils/errors';

export interface TransportRequest {
    url: string;
    body: SearchPayload;
    headers: Record<string, string>;
    timeout_ms: number;
}

export interface TransportResponse {
    status: number;
    body: string; // raw, undecoded
}

/**
 * One outbound request. Resolves with whatever HTTP status came back and
 * rejects with TransportError only when no HTTP answer was received.
 */
export interface Transport {
    send(request: TransportRequest): Promise<TransportResponse>;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export class AxiosTransport implements Transport {
    private client: AxiosInstance;

    constructor(options: { adapter?: AxiosAdapter } = {}) {
        this.client = axios.create({
            adapter: options.adapter,
            responseType: 'text',
            // keep the body as text; decoding belongs to the extractor
            transformResponse: [(data: unknown) => data],
            validateStatus: () => true,
            maxRedirects: 3,
        });
    }

    async send(request: TransportRequest): Promise<TransportResponse> {
        try {
            const response = await this.client.post<unknown>(request.url, request.body, {
                headers: request.headers,
                timeout: request.timeout_ms,
            });
            return {
                status: response.status,
                body: typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? ''),
            };
        } catch (error: unknown) {
            if (axios.isAxiosError(error) && !error.response) {
                const failure = error.code && TIMEOUT_CODES.has(error.code) ? 'TIMEOUT' : 'CONNECTION';
                throw new TransportError(`${failure === 'TIMEOUT' ? 'Request timed out' : 'Connection failed'}: ${error.message}`, failure, request.url);
            }
            throw error;
        }
    }
}
