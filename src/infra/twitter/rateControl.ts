import { db } from "../../db.js";
import { RateLimitExceededError } from "../../domain/errors.js";
import { logger } from "../../logger.js";
import { toIso, unix } from "../../util/time.js";

export type Endpoint = "me" | "user" | "timeline";


// X API v2 read limits per 15-minute window (user context)
const ENDPOINT_CONFIG: Record<
    Endpoint,
    { limit: number; reserve: number; windowSec: number }
> = {
    me: { limit: 75, reserve: 0, windowSec: 15 * 60 },
    user: { limit: 300, reserve: 0, windowSec: 15 * 60 },
    timeline: { limit: 900, reserve: 0, windowSec: 15 * 60 },
};

const RESET_BUFFER_SEC = 60;

export interface RateState {
    limit?: number;
    remaining?: number;
    reset?: number;
    lastSpentAt?: number;
    storedAt?: number;
}

export class RateControl {
    /**
     * @param scope account the limits belong to; X counts user-context
     * limits per access token, so each account keeps its own state
     */
    constructor(private readonly scope?: string) {}

    guard(endpoint: Endpoint): RateState {
        const state = this.loadAndRefresh(endpoint);
        const cfg = ENDPOINT_CONFIG[endpoint];
        const limit = state.limit ?? cfg.limit;
        const remaining = state.remaining ?? limit;

        if (remaining <= cfg.reserve) {
            const now = unix();
            const lastSpent = state.lastSpentAt ?? now;

            let resetAt = state.reset;
            if (!resetAt || resetAt <= now) {
                // no usable reset: assume one full window from the last spend
                resetAt = Math.max(
                    lastSpent + cfg.windowSec,
                    now + cfg.windowSec,
                );
            }
            const safeReset = resetAt + RESET_BUFFER_SEC;

            if (!state.reset || state.reset <= now) {
                this.save(endpoint, {
                    ...state,
                    remaining,
                    reset: safeReset,
                    lastSpentAt: lastSpent,
                    storedAt: now,
                });
            }

            logger.warn("[Rate] Guard blocked", {
                component: "RateControl",
                action: "guard",
                endpoint,
                remaining,
                limit,
                resetAt: safeReset,
                resetAtIso: toIso(safeReset),
            });

            throw new RateLimitExceededError(
                `${endpoint} rate limited`,
                safeReset,
                remaining,
                limit,
            );
        }

        return state;
    }

    onSuccess(endpoint: Endpoint, response: unknown): RateState {
        const info = parseRate(response);
        const current = this.loadAndRefresh(endpoint);
        const now = unix();

        const next: RateState = info
            ? { ...info, lastSpentAt: now, storedAt: now }
            : {
                  ...decrement(current, ENDPOINT_CONFIG[endpoint].limit),
                  lastSpentAt: now,
                  storedAt: now,
              };

        this.save(endpoint, next);
        logger.debug("[Rate] Updated from success", {
            component: "RateControl",
            action: "onSuccess",
            endpoint,
            info,
            next: formatStateForLog(next),
        });
        return next;
    }

    /**
     * Records the rate info an error carries. Without any, only a rate-limit
     * error exhausts the window; other failures say nothing about the budget.
     */
    onError(endpoint: Endpoint, error: unknown, rateLimited: boolean): RateState {
        const info = parseRate(error);
        const current = this.loadAndRefresh(endpoint);
        const now = unix();

        let next: RateState;
        if (info) {
            next = { ...info, lastSpentAt: now, storedAt: now };
        } else if (rateLimited) {
            next = {
                ...current,
                remaining: 0,
                reset:
                    current.reset && current.reset > now
                        ? current.reset
                        : now + ENDPOINT_CONFIG[endpoint].windowSec,
                lastSpentAt: now,
                storedAt: now,
            };
        } else {
            return current;
        }

        this.save(endpoint, next);
        logger.warn("[Rate] Updated from error", {
            component: "RateControl",
            action: "onError",
            endpoint,
            info,
            next: formatStateForLog(next),
            error: String(error),
        });
        return next;
    }

    snapshot(endpoint: Endpoint): RateState {
        return this.loadAndRefresh(endpoint);
    }

    private loadAndRefresh(endpoint: Endpoint): RateState {
        const cfg = ENDPOINT_CONFIG[endpoint];
        const state = this.load(endpoint);
        const now = unix();

        if (state.reset && now >= state.reset) {
            const refreshed: RateState = {
                limit: state.limit ?? cfg.limit,
                remaining: state.limit ?? cfg.limit,
                reset: undefined,
                lastSpentAt: state.lastSpentAt,
                storedAt: now,
            };
            if (state.remaining !== refreshed.remaining) {
                this.save(endpoint, refreshed);
                logger.debug("[Rate] Reset passed; state refreshed", {
                    component: "RateControl",
                    action: "loadAndRefresh",
                    endpoint,
                    previous: formatStateForLog(state),
                    refreshed: formatStateForLog(refreshed),
                });
            }
            return refreshed;
        }
        return state;
    }

    private load(endpoint: Endpoint): RateState {
        const row = db
            .prepare<[string]>("SELECT value FROM meta WHERE key=?")
            .get(this.metaKey(endpoint)) as { value?: string } | undefined;
        if (!row?.value) return {};
        let parsed: unknown;
        try {
            parsed = JSON.parse(row.value);
        } catch (e) {
            logger.warn("[Rate] Discarding unreadable state", {
                component: "RateControl",
                endpoint,
                error: String(e),
            });
            return {};
        }
        return isRecord(parsed) ? sanitize(parsed) : {};
    }

    private save(endpoint: Endpoint, state: RateState): void {
        db.prepare<[string, string]>(
            "REPLACE INTO meta(key,value) VALUES(?,?)",
        ).run(this.metaKey(endpoint), JSON.stringify(state));
    }

    private metaKey(endpoint: Endpoint): string {
        const key = `rate_state_${endpoint}`;
        return this.scope ? `${key}:${this.scope}` : key;
    }
}

function formatStateForLog(state: RateState) {
    return {
        ...state,
        resetIso: toIso(state.reset),
        lastSpentAtIso: toIso(state.lastSpentAt),
        storedAtIso: toIso(state.storedAt),
    };
}

function finite(v: unknown): number | undefined {
    if (v === undefined || v === null || v === "") return undefined;
    const n = Number(v);
    return Number.isFinite(n) ? n : undefined;
}

function sanitize(state: Record<string, unknown>): RateState {
    const remaining = finite(state.remaining);
    return {
        limit: finite(state.limit),
        remaining: remaining !== undefined ? Math.max(0, remaining) : undefined,
        reset: finite(state.reset),
        lastSpentAt: finite(state.lastSpentAt),
        storedAt: finite(state.storedAt),
    };
}

function decrement(state: RateState, fallbackLimit: number): RateState {
    const limit = state.limit ?? fallbackLimit;
    const remaining =
        state.remaining !== undefined
            ? Math.max(0, state.remaining - 1)
            : limit - 1;
    return { ...state, limit, remaining };
}

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === "object" && v !== null;
}

function headerValue(headers: unknown, key: string): unknown {
    if (!isRecord(headers)) return undefined;
    const get = headers.get;
    if (typeof get === "function") {
        const v: unknown = get.call(headers, key);
        return v ?? undefined;
    }
    const v = headers[key];
    return Array.isArray(v) ? v[0] : v;
}

/**
 * Reads rate-limit info from a library response or error: `x-rate-limit-*`
 * headers first, then a nested `rateLimit` object, then direct fields.
 */
export function parseRate(obj: unknown): RateState | null {
    if (!isRecord(obj)) return null;

    const response = obj.response;
    const headers =
        obj.headers ?? (isRecord(response) ? response.headers : undefined);
    if (headers) {
        const limit = finite(headerValue(headers, "x-rate-limit-limit"));
        const remaining = finite(headerValue(headers, "x-rate-limit-remaining"));
        const reset = finite(headerValue(headers, "x-rate-limit-reset"));
        if (
            limit !== undefined &&
            remaining !== undefined &&
            reset !== undefined
        ) {
            return sanitize({ limit, remaining, reset });
        }
    }

    if (isRecord(obj.rateLimit)) {
        return parseRate(obj.rateLimit);
    }

    if (finite(obj.limit) !== undefined && finite(obj.remaining) !== undefined) {
        return sanitize({
            limit: obj.limit,
            remaining: obj.remaining,
            reset: obj.reset,
        });
    }

    return null;
}
