#!/usr/bin/env node

import * as dotenv from "dotenv";
import { createProgram } from "./program.js";
import { runCommitFlow } from "../commands/commit.js";
import { loadConfig } from "../config/loadConfig.js";
import { createGitRepository } from "../git/repository.js";
import { GeminiGenerator } from "../llm/gemini.js";
import { createLogger } from "../shared/logger.js";
import { createTerminalOperator } from "../shared/ui.js";

dotenv.config();

/**
 * Handle command errors consistently.
 */
async function handleCommandError(action: () => Promise<void>): Promise<void> {
    try {
        await action();
    } catch (err) {
        console.error(`❌ ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
    }
}

// ================= CLI Setup =================

const program = createProgram((overrides) =>
    handleCommandError(async () => {
        const config = loadConfig(overrides);
        const operator = createTerminalOperator();
        try {
            await runCommitFlow(config, {
                repository: createGitRepository(),
                operator,
                logger: createLogger(config.verbose),
                createGenerator: (apiKey) => GeminiGenerator.fromApiKey(apiKey),
            });
        } finally {
            operator.close();
        }
    })
);

await program.parseAsync(process.argv);
