/**
 * Base class for every failure the CLI reports with exit code 1.
 */
export class AiCommitError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * Missing credential or missing git binary.
 */
export class EnvironmentError extends AiCommitError {}

/**
 * Invalid rc file, unknown model or unknown language.
 */
export class ConfigError extends AiCommitError {}

export class GitCommandError extends AiCommitError {
    readonly args: string[];
    readonly stderr: string;
    readonly status: number | null;

    constructor(args: string[], stderr: string, status: number | null) {
        const lines = [`Error running \`git ${args.join(" ")}\`: ${stderr || `exit code ${status ?? "unknown"}`}`];
        if (stderr.toLowerCase().includes("not a git repository")) {
            lines.push("Make sure you are inside a Git repository.");
        }
        super(lines.join("\n"));
        this.args = args;
        this.stderr = stderr;
        this.status = status;
    }
}

/**
 * The generation service failed (transport error, blocked or empty output),
 * or its output was empty once sanitized.
 */
export class GenerationError extends AiCommitError {
    readonly reason: string;
    readonly feedback?: string;

    constructor(label: string, reason: string, feedback?: string) {
        const lines = [`Failed to generate ${label}: ${reason}`];
        if (feedback) lines.push(`Prompt feedback: ${feedback}`);
        super(lines.join("\n"));
        this.reason = reason;
        this.feedback = feedback;
    }
}
