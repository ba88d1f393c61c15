import { createInterface, type Interface } from "readline/promises";
import { stdin, stdout } from "process";
import type { Readable, Writable } from "stream";
import { AiCommitError } from "./errors.js";

/**
 * Whoever answers the confirmation prompts. The terminal is the only real
 * implementation; tests script the answers.
 */
export interface Operator {
    ask(question: string): Promise<string>;
}

export interface TerminalOperator extends Operator {
    close(): void;
}

/**
 * Operator reading answers line by line from one readline interface kept
 * open for the whole run, so piped answers are not lost between questions.
 */
export function createTerminalOperator(
    input: Readable = stdin,
    output: Writable = stdout
): TerminalOperator {
    let session: { rl: Interface; lines: AsyncIterator<string> } | undefined;

    function open() {
        const rl = createInterface({ input, output });
        return { rl, lines: rl[Symbol.asyncIterator]() };
    }

    return {
        async ask(question) {
            const { lines } = (session ??= open());
            output.write(question);
            const next = await lines.next();
            if (next.done) {
                throw new AiCommitError("Input closed before an answer was given.");
            }
            return next.value.trim().toLowerCase();
        },
        close() {
            session?.rl.close();
            session = undefined;
        },
    };
}

/**
 * Normalize user input for yes questions.
 */
export function isYes(answer: string): boolean {
    return answer === "y" || answer === "yes";
}

/**
 * Normalize user input for no questions.
 */
export function isNo(answer: string): boolean {
    return answer === "n" || answer === "no";
}
