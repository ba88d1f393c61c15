import { randomBytes } from "crypto";

export const FALLBACK_BRANCH_PREFIX = "ai-generated-branch-";

export function randomHex(): string {
    return randomBytes(4).toString("hex");
}

/**
 * Reduce model output to `[a-z0-9/-]+`. Never returns an empty string: when
 * nothing survives, a random `ai-generated-branch-xxxxxxxx` name is used.
 * Applying it twice gives the same result as applying it once.
 */
export function sanitizeBranchName(raw: string, hex: () => string = randomHex): string {
    const name = raw
        .replace(/^[`\s]+|[`\s]+$/g, "")
        .replace(/[\s_]+/g, "-")
        .replace(/[^A-Za-z0-9/-]/g, "")
        .replace(/^-+|-+$/g, "")
        .toLowerCase();

    return name || `${FALLBACK_BRANCH_PREFIX}${hex()}`;
}
