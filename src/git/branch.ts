import { GitCommandError } from "../shared/errors.js";
import { execGit, runGit } from "./run.js";

export type BranchCreation =
    | { kind: "created" }
    | { kind: "already-exists" }
    | { kind: "failed"; error: GitCommandError };

export function branchExists(name: string, cwd?: string): boolean {
    return execGit(["show-ref", "--verify", "--quiet", `refs/heads/${name}`], cwd).ok;
}

/**
 * Try `git checkout -b`. A failure is classified by asking git whether the
 * branch exists rather than by reading its error text.
 */
export function createBranch(name: string, cwd?: string): BranchCreation {
    const args = ["checkout", "-b", name];
    const result = execGit(args, cwd);
    if (result.ok) return { kind: "created" };
    if (branchExists(name, cwd)) return { kind: "already-exists" };
    return { kind: "failed", error: new GitCommandError(args, result.stderr, result.status) };
}

export function checkoutBranch(name: string, cwd?: string): void {
    runGit(["checkout", name], cwd);
}

/**
 * Create and switch to `name`; if it already exists, switch to it instead.
 */
export function createAndCheckoutBranch(
    name: string,
    cwd?: string
): "created" | "already-exists" {
    const creation = createBranch(name, cwd);
    switch (creation.kind) {
        case "created":
            return "created";
        case "already-exists":
            checkoutBranch(name, cwd);
            return "already-exists";
        case "failed":
            throw creation.error;
    }
}
