import fetch, { type RequestInit, type Response } from "node-fetch";
import pRetry, { AbortError } from "p-retry";
import type { z } from "zod";

import type { MbtaConfig } from "./config.js";
import { UpstreamFetchError, UpstreamValidationError } from "./errors.js";
import { RoutesResponseSchema, StopsResponseSchema, type MbtaRoute, type MbtaStop } from "./mbtaSchemas.js";

// ------------------------------
// types
// ------------------------------

export interface MbtaApi {
    getRoutes(routeTypes?: number[]): Promise<MbtaRoute[]>;
    getStops(routeIds?: string[]): Promise<MbtaStop[]>;
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

// ------------------------------
// retry policy
// ------------------------------

// rate limits and server hiccups; anything else is our fault and won't improve on retry
const RETRY_STATUSES = new Set([429, 500, 502, 503, 504]);

function errorMessage(err: unknown) {
    return err instanceof Error ? err.message : String(err);
}

// ------------------------------
// client
// ------------------------------

/**
 * Thin wrapper around the MBTA v3 API. Transient failures are retried with
 * exponential backoff, and every response is checked against its schema
 * before it leaves here.
 */
export class MbtaClient implements MbtaApi {
    constructor(
        private readonly config: MbtaConfig,
        private readonly fetchImpl: FetchLike = fetch
    ) { }

    async getRoutes(routeTypes?: number[]): Promise<MbtaRoute[]> {
        const params: Record<string, string> = {};
        if (routeTypes?.length) params["filter[type]"] = routeTypes.join(",");
        const res = await this.get("/routes", params, RoutesResponseSchema);
        return res.data;
    }

    async getStops(routeIds?: string[]): Promise<MbtaStop[]> {
        const params: Record<string, string> = {};
        if (routeIds?.length) params["filter[route]"] = routeIds.join(",");
        const res = await this.get("/stops", params, StopsResponseSchema);
        return res.data;
    }

    private async get<S extends z.ZodTypeAny>(path: string, params: Record<string, string>, schema: S): Promise<z.infer<S>> {
        const query = new URLSearchParams(params).toString();
        const url = `${this.config.baseUrl}${path}${query ? `?${query}` : ""}`;

        const res = await pRetry(() => this.attempt(path, url), {
            retries: this.config.maxRetries,
            minTimeout: this.config.backoffMs,
            factor: 2,
            onFailedAttempt: e => {
                console.error(`GET ${path} attempt ${e.attemptNumber} failed (${e.retriesLeft} retries left): ${e.message}`);
            },
        });

        let raw: unknown;
        try {
            raw = await res.json();
        } catch (err) {
            throw new UpstreamFetchError(path, "invalid JSON response", { cause: err });
        }

        const parsed = schema.safeParse(raw);
        if (!parsed.success) {
            const detail = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
            throw new UpstreamValidationError(path, `unexpected response shape (${detail})`, { cause: parsed.error });
        }
        return parsed.data;
    }

    private async attempt(path: string, url: string): Promise<Response> {
        let res: Response;
        try {
            res = await this.fetchImpl(url, {
                headers: {
                    "Accept": "application/vnd.api+json",
                    "x-api-key": this.config.apiKey,
                },
                signal: AbortSignal.timeout(this.config.timeoutMs),
            });
        } catch (err) {
            throw new UpstreamFetchError(path, `request failed: ${errorMessage(err)}`, { cause: err });
        }

        if (res.ok) return res;
        // drain the body so the socket is free for the retry
        await res.text().catch(() => undefined);
        const failure = new UpstreamFetchError(path, `HTTP ${res.status} ${res.statusText}`.trim());
        if (RETRY_STATUSES.has(res.status)) throw failure;
        throw new AbortError(failure);
    }
}
