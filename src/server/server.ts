import type { Server } from "node:http";
import express from "express";
import type { Logger } from "pino";
import { loadAppConfig } from "../config/loadConfig";
import { configureLogger, getLogger } from "../utils/logger";
import { createLLMClient } from "../llm/factory";
import { createContextRetriever } from "../retrieval/retriever";
import { createApiKeyMiddleware } from "./middleware/apiKey";
import { createApiRouter } from "./routers/api";
import { applyCors } from "./utils/cors";
import type { ServerContext } from "./utils/context";

export interface ServerOptions {
    configPath?: string;
    port?: number;
    /** Prebuilt context; skips config, provider and corpus loading. */
    context?: ServerContext;
    logger?: Logger;
}

type ExpressApp = ReturnType<typeof express>;

export interface RunningServer {
    app: ExpressApp;
    port: number;
    close(): Promise<void>;
}

async function createContext(configPath?: string): Promise<ServerContext> {
    const config = await loadAppConfig(configPath);

    configureLogger(config.logging);
    const logger = getLogger();
    logger.info("Loaded server configuration.");

    const llm = createLLMClient(config.llm, logger);
    const retriever = await createContextRetriever(config, llm.embedding, logger);

    if (!llm.chat) {
        logger.warn("No chat model configured; /ask is disabled.");
    }

    return { config, retriever, chat: llm.chat };
}

export function createApp(context: ServerContext, logger: Logger): ExpressApp {
    const app = express();
    app.use(express.json({ limit: "1mb" }));
    app.use(applyCors);

    const apiKeyMiddleware = createApiKeyMiddleware(context.config.server.apiKey);
    app.use((req, res, next) => {
        if (req.path === "/health") {
            next();
        } else {
            apiKeyMiddleware(req, res, next);
        }
    });

    app.use(createApiRouter(context, logger));

    return app;
}

export async function createServer(options: ServerOptions = {}): Promise<{ app: ExpressApp; context: ServerContext }> {
    const context = options.context ?? (await createContext(options.configPath));
    const logger = options.logger ?? getLogger();

    return { app: createApp(context, logger.child({ module: "server" })), context };
}

export async function startServer(options: ServerOptions = {}): Promise<RunningServer> {
    const { app } = await createServer(options);
    const logger = options.logger ?? getLogger();
    const requestedPort = options.port ?? Number(process.env.PORT ?? 3000);

    const server: Server = await new Promise((resolve, reject) => {
        const listener = app
            .listen(requestedPort, () => {
                listener.off("error", reject);
                resolve(listener);
            })
            .on("error", reject);
    });

    const address = server.address();
    const port = address !== null && typeof address === "object" ? address.port : requestedPort;
    logger.info({ port }, "Server listening.");

    return {
        app,
        port,
        close: () =>
            new Promise<void>((resolve, reject) => {
                server.close((error) => {
                    if (error) {
                        reject(error);
                    } else {
                        resolve();
                    }
                });
            }),
    };
}
