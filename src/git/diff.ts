import { runGit } from "./run.js";

export type DiffSource = "staged" | "unstaged";

export interface Diff {
    source: DiffSource;
    content: string;
}

/**
 * Read staged changes (what will be committed).
 */
export function getStagedDiff(cwd?: string): Diff {
    return { source: "staged", content: runGit(["diff", "--cached"], cwd) };
}

/**
 * Read changes in the working tree that are not staged yet.
 */
export function getUnstagedDiff(cwd?: string): Diff {
    return { source: "unstaged", content: runGit(["diff"], cwd) };
}

export interface DiffReader {
    getStagedDiff(): Diff;
    getUnstagedDiff(): Diff;
}

/**
 * Staged changes win. The working tree is only read when nothing is staged;
 * undefined means there is nothing to commit.
 */
export function selectDiff(reader: DiffReader): Diff | undefined {
    const staged = reader.getStagedDiff();
    if (staged.content) return staged;

    const unstaged = reader.getUnstagedDiff();
    if (unstaged.content) return unstaged;

    return undefined;
}
