import type { Request, Response, NextFunction, RequestHandler } from "express";

function extractHeader(req: Request, key: string): string | undefined {
    const value = req.get(key);
    return typeof value === "string" ? value.trim() : undefined;
}

/** Passes every request through when no key is configured. */
export function createApiKeyMiddleware(expectedKey?: string): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        if (!expectedKey) {
            next();
            return;
        }

        const headerKey = extractHeader(req, "x-api-key");
        const authHeader = extractHeader(req, "authorization");

        let providedKey = headerKey;
        if (!providedKey && authHeader?.toLowerCase().startsWith("bearer ")) {
            providedKey = authHeader.slice(7).trim();
        }

        if (!providedKey || providedKey !== expectedKey) {
            res.status(401).json({ status: "error", message: "Invalid or missing API key." });
            return;
        }

        next();
    };
}
