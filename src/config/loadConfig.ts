import fs from "fs";
import path from "path";
import os from "os";
import { z } from "zod";
import { ConfigError } from "../shared/errors.js";
import {
    SUPPORTED_LANGUAGES,
    SUPPORTED_MODELS,
    defaultConfig,
    type AiCommitConfig,
} from "./types.js";

export const RC_FILE_NAME = ".aicommitrc.json";

const rcFileSchema = z
    .object({
        model: z.enum(SUPPORTED_MODELS).optional(),
        lang: z.enum(SUPPORTED_LANGUAGES).optional(),
        interactive: z.boolean().optional(),
        verbose: z.boolean().optional(),
    })
    .strict();

export type RcFile = z.infer<typeof rcFileSchema>;

export type CliOverrides = Partial<
    Pick<AiCommitConfig, "model" | "lang" | "verbose" | "interactive" | "newBranch" | "dryRun">
>;

export interface LoadConfigOptions {
    cwd?: string;
    homeDir?: string;
    env?: NodeJS.ProcessEnv;
}

export function readRcFile(filePath: string): RcFile | null {
    if (!fs.existsSync(filePath)) return null;

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigError(`Could not read ${filePath}: ${reason}`);
    }

    const parsed = rcFileSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`)
            .join("\n");
        throw new ConfigError(`Invalid configuration in ${filePath}:\n${issues}`);
    }
    return parsed.data;
}

/**
 * Build the configuration once at startup.
 * Precedence: defaults <- ~/.aicommitrc.json <- <cwd>/.aicommitrc.json <- CLI flags.
 */
export function loadConfig(
    overrides: CliOverrides = {},
    options: LoadConfigOptions = {}
): AiCommitConfig {
    const env = options.env ?? process.env;
    const globalCfg = readRcFile(path.join(options.homeDir ?? os.homedir(), RC_FILE_NAME)) ?? {};
    // Using process.cwd() assumes user runs the command from the repo directory.
    const projectCfg = readRcFile(path.join(options.cwd ?? process.cwd(), RC_FILE_NAME)) ?? {};

    return {
        geminiApiKey: env.GEMINI_API_KEY?.trim() || undefined,
        model: overrides.model ?? projectCfg.model ?? globalCfg.model ?? defaultConfig.model,
        lang: overrides.lang ?? projectCfg.lang ?? globalCfg.lang ?? defaultConfig.lang,
        verbose:
            overrides.verbose ?? projectCfg.verbose ?? globalCfg.verbose ?? defaultConfig.verbose,
        interactive:
            overrides.interactive ??
            projectCfg.interactive ??
            globalCfg.interactive ??
            defaultConfig.interactive,
        newBranch: overrides.newBranch ?? defaultConfig.newBranch,
        dryRun: overrides.dryRun ?? defaultConfig.dryRun,
    };
}
