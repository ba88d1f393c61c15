import { describe, it, expect, vi } from "vitest";
import { runCommitFlow } from "../../src/commands/commit.js";
import { defaultConfig, type AiCommitConfig } from "../../src/config/types.js";
import type { GenerationResult } from "../../src/llm/types.js";
import { EnvironmentError, GenerationError } from "../../src/shared/errors.js";
import {
    createFakeRepository,
    scriptedGenerator,
    scriptedOperator,
    silentLogger,
} from "../helpers/fakes.js";

function configWith(overrides: Partial<AiCommitConfig> = {}): AiCommitConfig {
    return { ...defaultConfig, geminiApiKey: "test-key", ...overrides };
}

function setup(options: {
    staged?: string;
    unstaged?: string;
    results?: GenerationResult[];
    answers?: string[];
}) {
    const { repository, calls } = createFakeRepository(options.staged, options.unstaged);
    const { generator, requests } = scriptedGenerator(options.results ?? []);
    const { operator } = scriptedOperator(options.answers ?? []);
    const logger = silentLogger();
    const createGenerator = vi.fn((_apiKey: string) => generator);
    const deps = { repository, operator, logger, createGenerator, randomHex: () => "0badc0de" };
    return { deps, repository, calls, generator, requests, operator, logger, createGenerator };
}

describe("runCommitFlow", () => {
    it("does nothing when there are no changes", async () => {
        const { deps, calls, createGenerator, logger } = setup({});

        const outcome = await runCommitFlow(configWith(), deps);

        expect(outcome).toEqual({ status: "no-changes" });
        expect(calls).toEqual(["getStagedDiff", "getUnstagedDiff"]);
        expect(createGenerator).not.toHaveBeenCalled();
        expect(logger.info).toHaveBeenCalledWith("✅ No changes detected to commit.");
    });

    it("is a no-op without changes even when the API key is missing", async () => {
        const { deps } = setup({});

        const outcome = await runCommitFlow(configWith({ geminiApiKey: undefined }), deps);

        expect(outcome).toEqual({ status: "no-changes" });
    });

    it("fails before any generation when the API key is missing", async () => {
        const { deps, createGenerator, calls } = setup({ staged: "+a" });

        await expect(
            runCommitFlow(configWith({ geminiApiKey: undefined }), deps)
        ).rejects.toBeInstanceOf(EnvironmentError);
        expect(createGenerator).not.toHaveBeenCalled();
        expect(calls).toEqual(["getStagedDiff"]);
    });

    it("commits staged changes without reading or staging the working tree", async () => {
        const { deps, calls, requests } = setup({
            staged: "+const staged = true;",
            unstaged: "+const unstaged = true;",
            results: [{ ok: true, text: "feat: add staged flag" }],
        });

        const outcome = await runCommitFlow(configWith(), deps);

        expect(outcome).toEqual({
            status: "committed",
            message: "feat: add staged flag",
            branch: undefined,
            staged: false,
        });
        expect(requests).toEqual([
            {
                kind: "commit-message",
                diff: "+const staged = true;",
                language: "en",
                model: "gemini-2.0-flash-lite",
            },
        ]);
        expect(calls).toEqual(["getStagedDiff", "commit:feat: add staged flag"]);
    });

    it("stages then commits unstaged changes with a sanitized message", async () => {
        const { deps, calls, createGenerator } = setup({
            unstaged: "+print('hi')\n",
            results: [{ ok: true, text: "```\nfeat: print 'hi' on start\n```" }],
        });

        const outcome = await runCommitFlow(configWith({ lang: "en" }), deps);

        expect(createGenerator).toHaveBeenCalledWith("test-key");
        expect(outcome).toEqual({
            status: "committed",
            message: "feat: print hi on start",
            branch: undefined,
            staged: true,
        });
        expect(calls).toEqual([
            "getStagedDiff",
            "getUnstagedDiff",
            "stageAll",
            "commit:feat: print hi on start",
        ]);
    });

    it("passes the configured language and model to the generator", async () => {
        const { deps, requests } = setup({
            staged: "+x",
            results: [{ ok: true, text: "feat: adiciona x" }],
        });

        await runCommitFlow(configWith({ lang: "pt", model: "gemini-1.5-flash" }), deps);

        expect(requests[0]).toMatchObject({ language: "pt", model: "gemini-1.5-flash" });
    });

    it("commits the third candidate after regenerating twice", async () => {
        const { deps, generator, calls } = setup({
            staged: "+x",
            results: [
                { ok: true, text: "feat: one" },
                { ok: true, text: "feat: two" },
                { ok: true, text: "feat: three" },
            ],
            answers: ["r", "r", "y"],
        });

        const outcome = await runCommitFlow(configWith({ interactive: true }), deps);

        expect(generator.generate).toHaveBeenCalledTimes(3);
        expect(outcome).toMatchObject({ status: "committed", message: "feat: three" });
        expect(calls).toEqual(["getStagedDiff", "commit:feat: three"]);
    });

    it("makes no change when the operator rejects the message", async () => {
        const { deps, calls } = setup({
            unstaged: "+x",
            results: [{ ok: true, text: "feat: x" }],
            answers: ["n"],
        });

        const outcome = await runCommitFlow(configWith({ interactive: true }), deps);

        expect(outcome).toEqual({ status: "rejected" });
        expect(calls).toEqual(["getStagedDiff", "getUnstagedDiff"]);
    });

    it("fails without committing when the message is empty after sanitization", async () => {
        const { deps, calls } = setup({
            unstaged: "+x",
            results: [{ ok: true, text: "```''```" }],
        });

        const attempt = runCommitFlow(configWith(), deps);

        await expect(attempt).rejects.toBeInstanceOf(GenerationError);
        await expect(attempt).rejects.toThrow(
            "Failed to generate commit message: empty output after sanitization"
        );
        expect(calls).toEqual(["getStagedDiff", "getUnstagedDiff"]);
    });

    it("fails without committing when generation fails non-interactively", async () => {
        const { deps, calls } = setup({
            staged: "+x",
            results: [{ ok: false, reason: "empty output" }],
        });

        await expect(runCommitFlow(configWith(), deps)).rejects.toBeInstanceOf(GenerationError);
        expect(calls).toEqual(["getStagedDiff"]);
    });

    it("creates a branch from the sanitized name before committing", async () => {
        const { deps, calls, requests } = setup({
            unstaged: "+login()",
            results: [
                { ok: true, text: "`Feat/Add Login_Form`" },
                { ok: true, text: "feat: add login form" },
            ],
        });

        const outcome = await runCommitFlow(configWith({ newBranch: true }), deps);

        expect(requests.map((r) => r.kind)).toEqual(["branch-name", "commit-message"]);
        expect(outcome).toEqual({
            status: "committed",
            message: "feat: add login form",
            branch: "feat/add-login-form",
            staged: true,
        });
        expect(calls).toEqual([
            "getStagedDiff",
            "getUnstagedDiff",
            "createAndCheckoutBranch:feat/add-login-form",
            "stageAll",
            "commit:feat: add login form",
        ]);
    });

    it("uses a generated branch name when nothing usable comes back", async () => {
        const { deps, calls } = setup({
            staged: "+x",
            results: [
                { ok: true, text: "!!!" },
                { ok: true, text: "chore: x" },
            ],
        });

        await runCommitFlow(configWith({ newBranch: true }), deps);

        expect(calls).toContain("createAndCheckoutBranch:ai-generated-branch-0badc0de");
    });

    it("stops before creating a branch when the branch name is rejected", async () => {
        const { deps, calls, generator } = setup({
            staged: "+x",
            results: [{ ok: true, text: "feat/x" }],
            answers: ["n"],
        });

        const outcome = await runCommitFlow(
            configWith({ newBranch: true, interactive: true }),
            deps
        );

        expect(outcome).toEqual({ status: "rejected" });
        expect(generator.generate).toHaveBeenCalledTimes(1);
        expect(calls).toEqual(["getStagedDiff"]);
    });

    it("only prints the suggestions in dry-run mode", async () => {
        const { deps, calls, logger } = setup({
            unstaged: "+x",
            results: [
                { ok: true, text: "fix/x" },
                { ok: true, text: "fix: x" },
            ],
        });

        const outcome = await runCommitFlow(configWith({ newBranch: true, dryRun: true }), deps);

        expect(outcome).toEqual({ status: "previewed", message: "fix: x", branch: "fix/x" });
        expect(calls).toEqual(["getStagedDiff", "getUnstagedDiff"]);
        expect(logger.info).toHaveBeenCalledWith("Branch: fix/x");
        expect(logger.info).toHaveBeenCalledWith("fix: x");
    });
});
