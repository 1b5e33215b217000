import Bottleneck from "bottleneck";
import type { Logger } from "pino";

const ONE_MINUTE_MS = 60_000;

export interface RateLimiterOptions {
    /** Shows up in log lines, e.g. `openai:embed:requests`. */
    id: string;
    concurrency: number;
    /** Units (requests or tokens) released every minute. Unlimited when unset. */
    perMinute?: number;
    logger?: Logger;
}

export function createRateLimiter({ id, concurrency, perMinute, logger }: RateLimiterOptions): Bottleneck {
    const options: { -readonly [K in keyof Bottleneck.ConstructorOptions]: Bottleneck.ConstructorOptions[K] } = {
        id,
        maxConcurrent: Math.max(1, concurrency),
    };

    if (perMinute && Number.isFinite(perMinute)) {
        const amount = Math.max(1, Math.floor(perMinute));
        options.reservoir = amount;
        options.reservoirRefreshAmount = amount;
        options.reservoirRefreshInterval = ONE_MINUTE_MS;
    }

    const limiter = new Bottleneck(options);
    limiter.on("depleted", () => {
        logger?.debug({ limiter: id }, "Rate limit reached; waiting for the next window.");
    });
    limiter.on("error", (error: unknown) => {
        logger?.error({ err: error, limiter: id }, "Rate limiter failed.");
    });
    return limiter;
}
