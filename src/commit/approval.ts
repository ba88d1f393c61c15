import type { GenerationResult } from "../llm/types.js";
import { GenerationError } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import { isNo, isYes, type Operator } from "../shared/ui.js";

export type ConfirmationDecision = "accept" | "reject" | "regenerate";

export type ConfirmationOutcome =
    | { status: "accepted"; value: string }
    | { status: "rejected" };

export interface ResolveCandidateOptions {
    /** Shown to the operator, e.g. "commit message". */
    label: string;
    /** Generates and sanitizes one candidate. */
    produce: () => Promise<GenerationResult>;
    interactive: boolean;
    operator: Operator;
    logger: Logger;
}

export function parseDecision(answer: string): ConfirmationDecision | undefined {
    const normalized = answer.trim().toLowerCase();
    if (isYes(normalized)) return "accept";
    if (isNo(normalized)) return "reject";
    if (normalized === "r") return "regenerate";
    return undefined;
}

/**
 * Ask until the operator picks y, n or r.
 */
async function askDecision(
    label: string,
    candidate: string,
    operator: Operator,
    logger: Logger
): Promise<ConfirmationDecision> {
    while (true) {
        logger.info(`\nProposed ${label}:\n`);
        logger.info(candidate + "\n");

        const decision = parseDecision(
            await operator.ask("(y) accept  (r) regenerate  (n) cancel: ")
        );
        if (decision) return decision;

        logger.info("Please choose y, r, or n.");
    }
}

/**
 * Generate a candidate and, in interactive mode, loop until the operator
 * accepts or rejects it. Generation failures are fatal unless the operator
 * asks to retry.
 */
export async function resolveCandidate(
    options: ResolveCandidateOptions
): Promise<ConfirmationOutcome> {
    const { label, produce, interactive, operator, logger } = options;

    while (true) {
        logger.step(`🤖 Generating ${label}...`);
        const result = await produce();

        if (!result.ok) {
            const error = new GenerationError(label, result.reason, result.feedback);
            if (!interactive) throw error;

            logger.error(error.message);
            const retry = await operator.ask("Try again? (y/n): ");
            if (isYes(retry.trim().toLowerCase())) continue;
            throw error;
        }

        if (!interactive) {
            logger.step(`✨ Generated ${label}: '${result.text}'`);
            return { status: "accepted", value: result.text };
        }

        const decision = await askDecision(label, result.text, operator, logger);
        if (decision === "accept") return { status: "accepted", value: result.text };
        if (decision === "reject") return { status: "rejected" };
    }
}
