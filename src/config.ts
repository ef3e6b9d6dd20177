import { z } from "zod";
import { ConfigError } from "./errors.js";

export const MBTA_BASE_URL = "https://api-v3.mbta.com";

const EnvSchema = z.object({
    MBTA_API_KEY: z.string({ required_error: "MBTA_API_KEY is not set" }).min(1, "MBTA_API_KEY is not set"),
    MBTA_BASE_URL: z.string().url().default(MBTA_BASE_URL),
    MBTA_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    MBTA_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
    MBTA_BACKOFF_MS: z.coerce.number().int().nonnegative().default(300),
    // be nice to the API between per-route stop requests
    MBTA_REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(100),
});

export type MbtaConfig = {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
    maxRetries: number;
    backoffMs: number;
    requestDelayMs: number;
};

export function loadConfig(env: Record<string, string | undefined> = process.env): MbtaConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const detail = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
        throw new ConfigError(`invalid configuration (${detail})`);
    }
    const e = parsed.data;
    return {
        apiKey: e.MBTA_API_KEY,
        baseUrl: e.MBTA_BASE_URL.replace(/\/+$/, ""),
        timeoutMs: e.MBTA_TIMEOUT_MS,
        maxRetries: e.MBTA_MAX_RETRIES,
        backoffMs: e.MBTA_BACKOFF_MS,
        requestDelayMs: e.MBTA_REQUEST_DELAY_MS,
    };
}
