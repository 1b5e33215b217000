import readline from "node:readline/promises";
import { loadAppConfig, resolveConfigPath } from "../config/loadConfig";
import { createLLMClient } from "../llm/factory";
import { createContextRetriever } from "../retrieval/retriever";
import { configureLogger, getLogger } from "../utils/logger";

interface CliOptions {
    configPath: string;
    json: boolean;
    offline: boolean;
    query?: string;
}

function printHelp(): void {
    const lines = [
        "Usage: retrieve [--config <path-to-env>] [--json] [--offline] [query...]",
        "",
        "Prints the prompt context assembled for a query. Reads the query from stdin when none is given.",
        "",
        "Options:",
        "  -c, --config   Path to the .env configuration file (defaults to .env in package root).",
        "  -j, --json     Print the selected chunks per category as JSON instead of the prompt.",
        "      --offline  Do not download missing embedding artifacts.",
        "  -h, --help     Show this help message.",
    ];
    console.log(lines.join("\n"));
}

function parseArgs(argv: string[]): CliOptions {
    let configPath: string | undefined;
    let json = false;
    let offline = false;
    const queryParts: string[] = [];

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];

        switch (arg) {
            case "-h":
            case "--help":
                printHelp();
                process.exit(0);
            case "-c":
            case "--config":
                configPath = argv[i + 1];
                i += 1;
                break;
            case "-j":
            case "--json":
                json = true;
                break;
            case "--offline":
                offline = true;
                break;
            default:
                queryParts.push(arg);
                break;
        }
    }

    const query = queryParts.join(" ");
    return { configPath: resolveConfigPath(configPath), json, offline, query: query || undefined };
}

async function promptForQuery(): Promise<string> {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    try {
        return await rl.question("Query: ");
    } finally {
        rl.close();
    }
}

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2));
    const config = await loadAppConfig(options.configPath);

    configureLogger(config.logging);
    const logger = getLogger();

    const llm = createLLMClient(config.llm, logger);
    const retriever = await createContextRetriever(config, llm.embedding, logger, { offline: options.offline });

    const query = options.query ?? (await promptForQuery());
    const sections = await retriever.retrieveSections(query);

    if (options.json) {
        console.log(JSON.stringify(sections, null, 2));
        return;
    }

    console.log(retriever.render(sections, query));
}

main().catch((error) => {
    const logger = getLogger();
    logger.error({ err: error }, "Retrieval failed.");
    process.exitCode = 1;
});
