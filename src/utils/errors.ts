/**
 * Raised while building the corpus store. The engine cannot serve queries
 * until the offending artifact is fixed.
 */
export class CorpusLoadError extends Error {
    constructor(
        message: string,
        public readonly artifact?: string,
        options?: { cause?: unknown }
    ) {
        super(artifact ? `${artifact}: ${message}` : message, options);
        this.name = "CorpusLoadError";
    }
}

export class ArtifactDownloadError extends Error {
    constructor(
        public readonly url: string,
        public readonly status: number,
        message?: string
    ) {
        super(message ?? `Download of ${url} failed with status ${status}.`);
        this.name = "ArtifactDownloadError";
    }
}

export class EmptyQueryError extends Error {
    constructor() {
        super("Query cannot be empty.");
        this.name = "EmptyQueryError";
    }
}

export class UnknownAspectError extends Error {
    constructor(
        public readonly aspect: string,
        public readonly known: string[]
    ) {
        super(`Unknown aspect "${aspect}". Expected one of: ${known.join(", ")}.`);
        this.name = "UnknownAspectError";
    }
}

export function isAbortError(error: unknown): boolean {
    return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}
