//
// Query parameter parsing for the REST routes.
// Invalid input surfaces as BAD_REQUEST (400) through the shared error handler.

import { badRequest } from "../lib/errors";

/** Querystring as fastify hands it over (repeated keys become arrays). */
export type QueryParams = Record<string, string | string[] | undefined>;

export function getString(query: QueryParams, key: string): string | undefined {
	const raw = query[key];
	// Repeated parameter: the last value wins
	const v = Array.isArray(raw) ? raw[raw.length - 1] : raw;
	if (v === undefined) return undefined;
	const trimmed = v.trim();
	return trimmed.length ? trimmed : undefined;
}

export function getInt(query: QueryParams, key: string): number | undefined {
	const v = getString(query, key);
	if (v === undefined) return undefined;
	if (!/^-?\d+$/.test(v)) throw badRequest(`Invalid integer for '${key}'`);
	const n = Number.parseInt(v, 10);
	if (!Number.isSafeInteger(n)) throw badRequest(`Invalid integer for '${key}'`);
	return n;
}

export function getPositiveInt(query: QueryParams, key: string): number | undefined {
	const n = getInt(query, key);
	if (n === undefined) return undefined;
	if (n <= 0) throw badRequest(`'${key}' must be > 0`);
	return n;
}

/** Positive integer with a default; values above `max` are clamped. */
export function parseBoundedInt(
	query: QueryParams,
	key: string,
	opts: { defaultValue: number; max: number }
): number {
	const n = getPositiveInt(query, key) ?? opts.defaultValue;
	return Math.min(n, opts.max);
}

export function parseHours(query: QueryParams): number {
	return parseBoundedInt(query, "hours", { defaultValue: 24, max: 720 });
}

export function parseLimit(query: QueryParams): number {
	return parseBoundedInt(query, "limit", { defaultValue: 50, max: 200 });
}
