import { runGit } from "./run.js";

/**
 * Stage the whole working tree, including deletions and untracked files.
 */
export function stageAll(cwd?: string): void {
    runGit(["add", "--all"], cwd);
}

/**
 * Commit what is staged. The message goes through argv, not a shell, so
 * multi-line messages need no quoting.
 */
export function commitWithMessage(message: string, cwd?: string): void {
    runGit(["commit", "-m", message], cwd);
}
