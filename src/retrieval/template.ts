import fs from "node:fs/promises";
import { fileURLToPath } from "node:url";
import type { Logger } from "pino";
import { CATEGORIES } from "../corpus/types";
import { getLogger } from "../utils/logger";
import { placeholderFor } from "./format";

export const DEFAULT_TEMPLATE_PATH = fileURLToPath(new URL("../../templates/context-prompt.txt", import.meta.url));

export async function loadPromptTemplate(templatePath?: string, logger?: Logger): Promise<string> {
    const resolved = templatePath ?? DEFAULT_TEMPLATE_PATH;
    const activeLogger = logger ?? getLogger();

    let template: string;
    try {
        template = await fs.readFile(resolved, "utf8");
    } catch (error) {
        throw new Error(`Failed to read prompt template from "${resolved}": ${error instanceof Error ? error.message : String(error)}`, { cause: error });
    }

    const missing = CATEGORIES.filter((category) => !template.includes(placeholderFor(category)));
    if (missing.length > 0) {
        activeLogger.warn({ templatePath: resolved, missing }, "Prompt template lacks placeholders; those sections will not appear.");
    }

    return template;
}
