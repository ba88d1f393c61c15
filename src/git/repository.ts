import { createAndCheckoutBranch } from "./branch.js";
import { commitWithMessage, stageAll } from "./commit.js";
import { getStagedDiff, getUnstagedDiff, type DiffReader } from "./diff.js";

/**
 * Everything the commit pipeline reads from or writes to the repository.
 */
export interface Repository extends DiffReader {
    stageAll(): void;
    createAndCheckoutBranch(name: string): "created" | "already-exists";
    commit(message: string): void;
}

export function createGitRepository(cwd: string = process.cwd()): Repository {
    return {
        getStagedDiff: () => getStagedDiff(cwd),
        getUnstagedDiff: () => getUnstagedDiff(cwd),
        stageAll: () => stageAll(cwd),
        createAndCheckoutBranch: (name) => createAndCheckoutBranch(name, cwd),
        commit: (message) => commitWithMessage(message, cwd),
    };
}
