export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

/** Credentials rejected by the API (HTTP 401/403). */
export class AuthenticationError extends Error {
    status?: number;
    constructor(message = "Authentication failed", status?: number) {
        super(message);
        this.name = "AuthenticationError";
        this.status = status;
    }
}

/** The request never produced a usable response: socket errors, 5xx. */
export class NetworkError extends Error {
    status?: number;
    constructor(message = "Network failure", status?: number) {
        super(message);
        this.name = "NetworkError";
        this.status = status;
    }
}

export class NotFoundError extends Error {
    constructor(message = "Not found") {
        super(message);
        this.name = "NotFoundError";
    }
}

export class RateLimitExceededError extends Error {
    resetAt?: number; // unix seconds when retry is allowed
    remaining?: number;
    limit?: number;
    constructor(
        message = "Rate limit exceeded",
        resetAt?: number,
        remaining?: number,
        limit?: number,
    ) {
        super(message);
        this.name = "RateLimitExceededError";
        this.resetAt = resetAt;
        this.remaining = remaining;
        this.limit = limit;
    }
}
