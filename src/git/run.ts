import { spawnSync } from "child_process";
import { EnvironmentError, GitCommandError } from "../shared/errors.js";

export interface GitResult {
    ok: boolean;
    status: number | null;
    stdout: string;
    stderr: string;
}

/**
 * Run git without a shell and capture its output. Only a missing or
 * unspawnable binary throws; a non-zero exit is reported in the result.
 */
export function execGit(args: string[], cwd?: string): GitResult {
    const r = spawnSync("git", args, {
        cwd,
        encoding: "utf8",
        shell: false,
    });

    if (r.error) {
        if ("code" in r.error && r.error.code === "ENOENT") {
            throw new EnvironmentError(
                "The `git` command was not found. Is Git installed and on your PATH?"
            );
        }
        throw new GitCommandError(args, r.error.message, r.status);
    }

    return {
        ok: r.status === 0,
        status: r.status,
        stdout: (r.stdout ?? "").trim(),
        stderr: (r.stderr ?? "").trim(),
    };
}

/**
 * Run git and return trimmed stdout; any failure is fatal.
 */
export function runGit(args: string[], cwd?: string): string {
    const result = execGit(args, cwd);
    if (!result.ok) {
        throw new GitCommandError(args, result.stderr, result.status);
    }
    return result.stdout;
}
