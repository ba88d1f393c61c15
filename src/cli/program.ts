import { Command, Option } from "commander";
import type { CliOverrides } from "../config/loadConfig.js";
import {
    SUPPORTED_LANGUAGES,
    SUPPORTED_MODELS,
    defaultConfig,
    type Language,
    type ModelName,
} from "../config/types.js";

export const VERSION = "0.5.0";

type CliOptions = {
    verbose?: boolean;
    lang?: Language;
    model?: ModelName;
    newBranch?: boolean;
    interactive?: boolean;
    dryRun?: boolean;
};

/**
 * Build the `aicommit` command. Unknown --lang / --model values are rejected
 * by commander while parsing, before `run` is called.
 */
export function createProgram(run: (overrides: CliOverrides) => Promise<void>): Command {
    const program = new Command();

    program
        .name("aicommit")
        .description("Generate Git commit messages (and branch names) from your changes using AI")
        .version(VERSION)
        .option("-v, --verbose", "print progress while running")
        .addOption(
            new Option("-l, --lang <lang>", `commit message language (default: ${defaultConfig.lang})`)
                .choices(SUPPORTED_LANGUAGES)
        )
        .addOption(
            new Option("-m, --model <name>", `Gemini model (default: ${defaultConfig.model})`)
                .choices(SUPPORTED_MODELS)
        )
        .option("-b, --new-branch", "generate a branch name and switch to it before committing")
        .option("-i, --interactive", "confirm, regenerate or cancel each suggestion")
        .option("--dry-run", "print the suggestions without touching the repository")
        .action(async () => {
            const opts = program.opts<CliOptions>();
            await run({
                verbose: opts.verbose,
                lang: opts.lang,
                model: opts.model,
                newBranch: opts.newBranch,
                interactive: opts.interactive,
                dryRun: opts.dryRun,
            });
        });

    return program;
}
