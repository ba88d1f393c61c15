export const SUPPORTED_MODELS = [
    "gemini-2.0-flash-lite",
    "gemini-2.0-flash",
    "gemini-1.5-flash",
    "gemini-1.5-pro",
] as const;

export type ModelName = (typeof SUPPORTED_MODELS)[number];

export const SUPPORTED_LANGUAGES = ["pt", "en"] as const;

export type Language = (typeof SUPPORTED_LANGUAGES)[number];

export type AiCommitConfig = {
    geminiApiKey?: string;
    model: ModelName;
    lang: Language;
    verbose: boolean;
    interactive: boolean;
    newBranch: boolean;
    dryRun: boolean;
};

export const defaultConfig: AiCommitConfig = {
    model: "gemini-2.0-flash-lite",
    lang: "en",
    verbose: false,
    interactive: false,
    newBranch: false,
    dryRun: false,
};

export function isSupportedModel(value: string): value is ModelName {
    return SUPPORTED_MODELS.some((model) => model === value);
}
