import { loadAppConfig, resolveConfigPath } from "../config/loadConfig";
import { ensureArtifacts } from "../corpus/artifacts";
import { configureLogger, getLogger } from "../utils/logger";

function printHelp(): void {
    const lines = [
        "Usage: fetch-artifacts [--config <path-to-env>]",
        "",
        "Downloads any missing embedding artifact into the configured embeddings directory.",
        "",
        "Options:",
        "  -c, --config   Path to the .env configuration file (defaults to .env in package root).",
        "  -h, --help     Show this help message.",
    ];
    console.log(lines.join("\n"));
}

function parseArgs(argv: string[]): { configPath: string } {
    let configPath: string | undefined;

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];

        if (arg === "-h" || arg === "--help") {
            printHelp();
            process.exit(0);
        }

        if (arg === "-c" || arg === "--config") {
            configPath = argv[i + 1];
            i += 1;
            continue;
        }

        if (!configPath) {
            configPath = arg;
        }
    }

    return { configPath: resolveConfigPath(configPath) };
}

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2));
    const config = await loadAppConfig(options.configPath);

    configureLogger(config.logging);
    const logger = getLogger();

    const controller = new AbortController();
    process.once("SIGINT", () => {
        logger.warn("Interrupted; abandoning remaining downloads.");
        controller.abort();
    });

    const result = await ensureArtifacts({
        rootDir: config.corpus.embeddingsDir,
        baseUrl: config.corpus.remoteBaseUrl,
        concurrency: config.corpus.downloadConcurrency,
        retries: config.corpus.downloadRetries,
        signal: controller.signal,
        logger,
    });

    logger.info(`Artifacts already present: ${result.present.length}`);
    logger.info(`Artifacts downloaded: ${result.downloaded.length}`);
}

main().catch((error) => {
    const logger = getLogger();
    logger.error({ err: error }, "Artifact fetch failed.");
    process.exitCode = 1;
});
