import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import pLimit from "p-limit";
import pRetry, { AbortError, type FailedAttemptError } from "p-retry";
import { getLogger } from "../utils/logger";
import { ArtifactDownloadError } from "../utils/errors";
import { requiredArtifacts } from "./layout";

const DEFAULT_DOWNLOAD_CONCURRENCY = 4;
const DEFAULT_DOWNLOAD_RETRIES = 3;

export interface EnsureArtifactsOptions {
    rootDir: string;
    baseUrl: string;
    artifacts?: string[];
    concurrency?: number;
    retries?: number;
    signal?: AbortSignal;
    logger?: Logger;
}

export interface EnsureArtifactsResult {
    present: string[];
    downloaded: string[];
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && "code" in error;
}

async function isFile(filePath: string): Promise<boolean> {
    try {
        return (await fs.stat(filePath)).isFile();
    } catch (error) {
        if (isErrnoException(error) && error.code === "ENOENT") {
            return false;
        }
        throw error;
    }
}

export function artifactUrl(baseUrl: string, relativePath: string): string {
    const encoded = relativePath.split("/").map(encodeURIComponent).join("/");
    return `${baseUrl.replace(/\/+$/, "")}/${encoded}`;
}

async function fetchArtifact(url: string, retries: number, logger: Logger, signal?: AbortSignal): Promise<Buffer> {
    return pRetry(
        async () => {
            const response = await fetch(url, { signal });
            if (!response.ok) {
                const error = new ArtifactDownloadError(url, response.status);
                // 4xx other than 429 is final
                if (response.status >= 400 && response.status < 500 && response.status !== 429) {
                    throw new AbortError(error);
                }
                throw error;
            }
            return Buffer.from(await response.arrayBuffer());
        },
        {
            retries,
            signal,
            onFailedAttempt: (error: FailedAttemptError) => {
                logger.warn(
                    {
                        url,
                        attemptNumber: error.attemptNumber,
                        retriesLeft: error.retriesLeft,
                        error: error.message,
                    },
                    "Artifact download failed attempt."
                );
            },
        }
    );
}

/** The target path only ever holds a complete file. */
async function writeAtomically(target: string, contents: Buffer): Promise<void> {
    await fs.mkdir(path.dirname(target), { recursive: true });
    const temporary = `${target}.${process.pid}.${Date.now()}.partial`;

    try {
        await fs.writeFile(temporary, contents);
        await fs.rename(temporary, target);
    } catch (error) {
        await fs.rm(temporary, { force: true });
        throw error;
    }
}

export async function ensureArtifacts(options: EnsureArtifactsOptions): Promise<EnsureArtifactsResult> {
    const logger = options.logger ?? getLogger();
    const artifacts = options.artifacts ?? requiredArtifacts();
    const retries = options.retries ?? DEFAULT_DOWNLOAD_RETRIES;
    const limit = pLimit(Math.max(1, options.concurrency ?? DEFAULT_DOWNLOAD_CONCURRENCY));

    logger.info({ rootDir: options.rootDir, artifacts: artifacts.length }, "Checking embedding artifacts.");
    await fs.mkdir(options.rootDir, { recursive: true });

    const outcomes = await Promise.all(
        artifacts.map((relativePath) =>
            limit(async () => {
                const target = path.join(options.rootDir, relativePath);
                if (await isFile(target)) {
                    return { relativePath, downloaded: false };
                }

                options.signal?.throwIfAborted();
                const url = artifactUrl(options.baseUrl, relativePath);
                logger.info({ artifact: relativePath }, "Downloading artifact.");
                const contents = await fetchArtifact(url, retries, logger, options.signal);
                await writeAtomically(target, contents);
                logger.info({ artifact: relativePath, bytes: contents.length }, "Downloaded artifact.");
                return { relativePath, downloaded: true };
            })
        )
    );

    return {
        present: outcomes.filter((outcome) => !outcome.downloaded).map((outcome) => outcome.relativePath),
        downloaded: outcomes.filter((outcome) => outcome.downloaded).map((outcome) => outcome.relativePath),
    };
}
