import { startServer } from "./server";
import { getLogger } from "../utils/logger";

async function main(): Promise<void> {
    const configPath = process.argv[2];
    const running = await startServer({ configPath });

    const shutdown = (signal: NodeJS.Signals): void => {
        const logger = getLogger();
        logger.info({ signal }, "Shutting down server.");
        running.close().then(
            () => process.exit(0),
            (error: unknown) => {
                logger.error({ err: error }, "Failed to close server cleanly.");
                process.exit(1);
            }
        );
    };

    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
}

main().catch((error) => {
    getLogger().error({ err: error }, "Failed to start server.");
    process.exit(1);
});
