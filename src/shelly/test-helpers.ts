// src/shelly/test-helpers.ts
// In-process stand-in for a Shelly device, used by the *.test.ts files.

import { vi } from 'vitest';

import { AuthStateReader } from './auth-reader.js';
import { AuthStateWriter } from './auth-writer.js';
import { ConnectivityReporter } from './connectivity.js';
import { GenerationDetector } from './generation.js';
import type { FetchInit, FetchLike, FetchResponse } from './transport.js';
import { ShellyTransport } from './transport.js';

export interface FakeReply {
	status: number;
	body?: unknown;
	// Sent as-is instead of JSON-encoding `body`
	raw?: string;
}

export interface RecordedCall {
	method: string;
	url: string;
	path: string;
	query: URLSearchParams;
	headers: Record<string, string>;
	body: unknown;
}

export type FakeRoute = FakeReply | Error | ((call: RecordedCall) => FakeReply | Error);

export function timeoutError(): Error {
	const err = new Error('The operation was aborted due to timeout');
	err.name = 'TimeoutError';
	return err;
}

export function connectionError(): Error {
	return new TypeError('fetch failed');
}

export function basicHeader(username: string, password: string): string {
	return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}

/**
 * Routes are keyed by "METHOD /path". Anything unrouted behaves like an
 * unreachable host.
 */
export function createFakeFetch(routes: Record<string, FakeRoute>): {
	fetchFn: FetchLike;
	calls: RecordedCall[];
	signals: AbortSignal[];
} {
	const calls: RecordedCall[] = [];
	const signals: AbortSignal[] = [];

	const fetchFn: FetchLike = async (url: string, init: FetchInit): Promise<FetchResponse> => {
		const parsed = new URL(url);
		const body: unknown = init.body !== undefined ? JSON.parse(init.body) : undefined;

		const call: RecordedCall = {
			method: init.method,
			url,
			path: parsed.pathname,
			query: parsed.searchParams,
			headers: init.headers,
			body,
		};
		calls.push(call);
		signals.push(init.signal);

		const route = routes[`${init.method} ${parsed.pathname}`];
		if (route === undefined) {
			throw connectionError();
		}

		const reply = typeof route === 'function' ? route(call) : route;
		if (reply instanceof Error) {
			throw reply;
		}

		const text = reply.raw ?? (reply.body === undefined ? '' : JSON.stringify(reply.body));
		return {
			status: reply.status,
			text: async () => text,
		};
	};

	return { fetchFn, calls, signals };
}

export function createTestLogger() {
	return {
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	};
}

export function createEngine(routes: Record<string, FakeRoute>) {
	const { fetchFn, calls, signals } = createFakeFetch(routes);
	const log = createTestLogger();

	const transport = new ShellyTransport(log, fetchFn);
	const detector = new GenerationDetector(transport, log);

	return {
		calls,
		signals,
		log,
		transport,
		detector,
		reader: new AuthStateReader(transport, detector, log),
		writer: new AuthStateWriter(transport, detector, log),
		reporter: new ConnectivityReporter(transport, detector, log),
	};
}
