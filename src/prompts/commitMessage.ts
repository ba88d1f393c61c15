import type { Language } from "../config/types.js";

const LANGUAGE_NAMES: Partial<Record<string, string>> = {
    pt: "Portuguese",
    en: "English",
};

/**
 * Unknown codes fall back to English.
 */
export function languageName(lang: Language | string): string {
    return LANGUAGE_NAMES[lang] ?? "English";
}

export function buildCommitMessagePrompt(diff: string, lang: Language | string): string {
    return `
Generate a concise, meaningful commit message in ${languageName(lang)}, following the Conventional Commits standard (e.g. 'feat: add feature X', 'fix: correct bug Y', 'docs: update documentation Z', 'style: format code', 'refactor: restructure component A', 'test: add tests for B', 'chore: update dependencies').

The first line (title) must be at most 72 characters and clearly describe the changes in the following 'git diff':

${diff}

Generated commit message:
`;
}
