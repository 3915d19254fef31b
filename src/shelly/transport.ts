// src/shelly/transport.ts
// One-shot HTTP calls against a Shelly device on the LAN.
//
// Every call is a single attempt bounded by its own timeout. request() never
// throws: transport and decode failures come back as HttpResult values.

import type { ShellyCredentials, ShellyLogger } from './types.js';
import { consoleLogger } from './types.js';

export const PROBE_TIMEOUT_MS = 3_000;
export const READ_TIMEOUT_MS = 5_000;
export const MUTATION_TIMEOUT_MS = 10_000;

export type HttpMethod = 'GET' | 'POST';

export interface HttpRequest {
	method: HttpMethod;
	host: string;
	path: string;
	query?: Record<string, string>;
	json?: unknown;
	auth?: ShellyCredentials;
	timeoutMs: number;

	// false: decide on the status alone and leave the body unparsed
	parse?: boolean;
}

export type HttpFailureKind = 'timeout' | 'connection' | 'decode';

export type HttpResult =
	| {
		ok: true;
		status: number;
		// Parsed JSON for HTTP 200, undefined for every other status
		body: unknown;
	}
	| {
		ok: false;
		kind: HttpFailureKind;
		message: string;
	};

// Minimal fetch/response typing so tests can hand in a stub.
export interface FetchInit {
	method: string;
	headers: Record<string, string>;
	body?: string;
	signal: AbortSignal;
}

export interface FetchResponse {
	status: number;
	text(): Promise<string>;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponse>;

const defaultFetch: FetchLike = (url, init) => fetch(url, init);

export function buildUrl(host: string, path: string, query?: Record<string, string>): string {
	const base = `http://${host}${path}`;
	if (!query || Object.keys(query).length === 0) {
		return base;
	}
	return `${base}?${new URLSearchParams(query).toString()}`;
}

function errorName(err: unknown): string | undefined {
	if (typeof err === 'object' && err !== null && 'name' in err && typeof err.name === 'string') {
		return err.name;
	}
	return undefined;
}

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

export class ShellyTransport {
	private readonly log: ShellyLogger;
	private readonly fetchFn: FetchLike;

	constructor(logger?: ShellyLogger, fetchFn?: FetchLike) {
		this.log = logger ?? consoleLogger('shelly-http');
		this.fetchFn = fetchFn ?? defaultFetch;
	}

	public async request(req: HttpRequest): Promise<HttpResult> {
		const url = buildUrl(req.host, req.path, req.query);

		const headers: Record<string, string> = {
			Accept: 'application/json',
		};

		if (req.auth) {
			const token = Buffer.from(`${req.auth.username}:${req.auth.password}`).toString('base64');
			headers.Authorization = `Basic ${token}`;
		}

		let body: string | undefined;
		if (req.json !== undefined) {
			headers['Content-Type'] = 'application/json';
			body = JSON.stringify(req.json);
		}

		this.log.debug('Shelly: %s %s (timeout=%dms)', req.method, buildUrl(req.host, req.path), req.timeoutMs);

		let status: number;
		let text: string;
		try {
			const res = await this.fetchFn(url, {
				method: req.method,
				headers,
				body,
				signal: AbortSignal.timeout(req.timeoutMs),
			});
			status = res.status;
			// Drain the body even when it is not used.
			text = await res.text();
		} catch (err) {
			const name = errorName(err);
			const kind: HttpFailureKind =
				name === 'TimeoutError' || name === 'AbortError' ? 'timeout' : 'connection';

			return { ok: false, kind, message: errorMessage(err) };
		}

		if (status !== 200 || req.parse === false) {
			return { ok: true, status, body: undefined };
		}

		try {
			const parsed: unknown = JSON.parse(text);
			return { ok: true, status, body: parsed };
		} catch (err) {
			return {
				ok: false,
				kind: 'decode',
				message: `HTTP 200 with non-JSON payload: ${errorMessage(err)}`,
			};
		}
	}

	public get(
		host: string,
		path: string,
		timeoutMs: number,
		options: { query?: Record<string, string>; auth?: ShellyCredentials; parse?: boolean } = {},
	): Promise<HttpResult> {
		return this.request({ method: 'GET', host, path, timeoutMs, ...options });
	}

	public post(
		host: string,
		path: string,
		json: unknown,
		timeoutMs: number,
		options: { auth?: ShellyCredentials; parse?: boolean } = {},
	): Promise<HttpResult> {
		return this.request({ method: 'POST', host, path, json, timeoutMs, ...options });
	}
}
