import type { AiCommitConfig } from "../config/types.js";
import { resolveCandidate, type ConfirmationOutcome } from "../commit/approval.js";
import { selectDiff, type Diff } from "../git/diff.js";
import type { Repository } from "../git/repository.js";
import type { GenerationKind, GenerationResult, TextGenerator } from "../llm/types.js";
import { sanitizeBranchName } from "../sanitize/branchName.js";
import { sanitizeCommitText } from "../sanitize/commitText.js";
import { EnvironmentError } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import type { Operator } from "../shared/ui.js";

export interface CommitFlowDeps {
    repository: Repository;
    operator: Operator;
    logger: Logger;
    createGenerator: (apiKey: string) => TextGenerator;
    /** Source of the random suffix for fallback branch names. */
    randomHex?: () => string;
}

export type CommitFlowOutcome =
    | { status: "no-changes" }
    | { status: "rejected" }
    | { status: "previewed"; message: string; branch?: string }
    | { status: "committed"; message: string; branch?: string; staged: boolean };

async function generateCandidate(
    kind: GenerationKind,
    diff: Diff,
    config: AiCommitConfig,
    generator: TextGenerator,
    deps: CommitFlowDeps
): Promise<ConfirmationOutcome> {
    const label = kind === "commit-message" ? "commit message" : "branch name";

    const produce = async (): Promise<GenerationResult> => {
        const result = await generator.generate({
            kind,
            diff: diff.content,
            language: config.lang,
            model: config.model,
        });
        if (!result.ok) return result;

        if (kind === "branch-name") {
            return { ok: true, text: sanitizeBranchName(result.text, deps.randomHex) };
        }
        const message = sanitizeCommitText(result.text);
        return message
            ? { ok: true, text: message }
            : { ok: false, reason: "empty output after sanitization" };
    };

    return resolveCandidate({
        label,
        produce,
        interactive: config.interactive,
        operator: deps.operator,
        logger: deps.logger,
    });
}

/**
 * Main flow: pick diff -> (branch name -> branch) -> commit message -> stage -> commit.
 */
export async function runCommitFlow(
    config: AiCommitConfig,
    deps: CommitFlowDeps
): Promise<CommitFlowOutcome> {
    const { repository, logger } = deps;

    logger.step("🔍 Checking for changes...");
    const diff = selectDiff(repository);
    if (!diff) {
        logger.info("✅ No changes detected to commit.");
        return { status: "no-changes" };
    }
    logger.step(`📄 Using ${diff.source} changes.`);

    if (!config.geminiApiKey) {
        throw new EnvironmentError(
            [
                "Gemini API key (GEMINI_API_KEY) not found.",
                "Set env var:",
                '  export GEMINI_API_KEY="..."',
                "or add it to a .env file in the current directory.",
            ].join("\n")
        );
    }
    logger.step(`Using model ${config.model}.`);
    const generator = deps.createGenerator(config.geminiApiKey);

    let branch: string | undefined;
    if (config.newBranch) {
        const candidate = await generateCandidate("branch-name", diff, config, generator, deps);
        if (candidate.status === "rejected") {
            logger.info("Cancelled. No branch was created and no commit was made.");
            return { status: "rejected" };
        }
        branch = candidate.value;

        if (!config.dryRun) {
            logger.step(`🌿 Switching to branch '${branch}'...`);
            const created = repository.createAndCheckoutBranch(branch);
            logger.info(
                created === "created"
                    ? `🌿 Created branch '${branch}'.`
                    : `🌿 Branch '${branch}' already exists, checked it out.`
            );
        }
    }

    const candidate = await generateCandidate("commit-message", diff, config, generator, deps);
    if (candidate.status === "rejected") {
        logger.info("Cancelled. No commit was made.");
        return { status: "rejected" };
    }
    const message = candidate.value;

    if (config.dryRun) {
        if (branch) logger.info(`Branch: ${branch}`);
        logger.info(message);
        return { status: "previewed", message, branch };
    }

    const staged = diff.source === "unstaged";
    if (staged) {
        logger.step("➕ Staging all changes...");
        repository.stageAll();
    }

    logger.step(`🚀 Committing with message: '${message}'...`);
    repository.commit(message);
    logger.info("🎉 Commit created.");

    return { status: "committed", message, branch, staged };
}
