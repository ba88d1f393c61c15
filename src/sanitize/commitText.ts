/**
 * Strip code fences, backticks and both quote characters anywhere in the
 * text. Returns "" when nothing is left; callers treat that as a failed
 * generation.
 */
export function sanitizeCommitText(raw: string): string {
    return raw
        .trim()
        .replace(/```/g, "")
        .replace(/[`"']/g, "")
        .trim();
}
