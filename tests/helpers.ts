// ---------------------------------------------------------------------------
// Chapa SDK – Test Helpers
// ---------------------------------------------------------------------------
// In-process stand-ins for the transport. No test reaches the network.
// ---------------------------------------------------------------------------

import { vi, type Mock } from 'vitest';
import { ChapaConfigBuilder } from '../src/config';
import type { ChapaConfig } from '../src/types';

export const TEST_API_KEY = 'test-secret';
export const TEST_BASE_URL = 'https://chapa.test';

export type FetchMock = Mock<typeof fetch>;

/** JSON response as the API would send it. */
export function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

/** Transport answering every call with the same JSON body. */
export function fetchReturning(body: unknown, status = 200): FetchMock {
    return vi.fn<typeof fetch>(async () => jsonResponse(body, status));
}

export function testConfig(configure?: (builder: ChapaConfigBuilder) => void): ChapaConfig {
    const builder = new ChapaConfigBuilder().apiKey(TEST_API_KEY).baseUrl(TEST_BASE_URL);
    configure?.(builder);
    return builder.build();
}

export interface RecordedRequest {
    url: string;
    method: string | undefined;
    headers: Headers;
    body: unknown;
}

/** The `index`-th request the transport received. */
export function recordedRequest(mock: FetchMock, index = 0): RecordedRequest {
    const call = mock.mock.calls[index];
    if (!call) throw new Error(`fetch was called ${mock.mock.calls.length} time(s)`);
    const [input, init] = call;
    return {
        url: String(input),
        method: init?.method,
        headers: new Headers(init?.headers),
        body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    };
}
