import {
    GoogleGenAI,
    HarmBlockThreshold,
    HarmCategory,
    type GenerateContentParameters,
    type SafetySetting,
} from "@google/genai";
import { buildBranchNamePrompt } from "../prompts/branchName.js";
import { buildCommitMessagePrompt } from "../prompts/commitMessage.js";
import { isSupportedModel, SUPPORTED_MODELS } from "../config/types.js";
import { ConfigError, EnvironmentError } from "../shared/errors.js";
import type { GenerationRequest, GenerationResult, TextGenerator } from "./types.js";

// All four harm categories set to not block; diffs are not user content.
export const SAFETY_SETTINGS: SafetySetting[] = [
    HarmCategory.HARM_CATEGORY_HARASSMENT,
    HarmCategory.HARM_CATEGORY_HATE_SPEECH,
    HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT,
    HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT,
].map((category) => ({ category, threshold: HarmBlockThreshold.BLOCK_NONE }));

/**
 * The slice of a generateContent response this client reads.
 */
export interface GeminiResponse {
    text?: string;
    promptFeedback?: {
        blockReason?: string;
        blockReasonMessage?: string;
    };
}

export interface GeminiModels {
    generateContent(params: GenerateContentParameters): Promise<GeminiResponse>;
}

export function buildPrompt(request: GenerationRequest): string {
    return request.kind === "commit-message"
        ? buildCommitMessagePrompt(request.diff, request.language)
        : buildBranchNamePrompt(request.diff);
}

function describeFeedback(response: GeminiResponse): string | undefined {
    const feedback = response.promptFeedback;
    if (!feedback?.blockReason) return undefined;
    return feedback.blockReasonMessage
        ? `${feedback.blockReason} (${feedback.blockReasonMessage})`
        : feedback.blockReason;
}

export class GeminiGenerator implements TextGenerator {
    private readonly models: GeminiModels;

    constructor(models: GeminiModels) {
        this.models = models;
    }

    static fromApiKey(apiKey: string): GeminiGenerator {
        if (!apiKey.trim()) {
            throw new EnvironmentError("Gemini API key is required. Set GEMINI_API_KEY env var.");
        }
        return new GeminiGenerator(new GoogleGenAI({ apiKey }).models);
    }

    async generate(request: GenerationRequest): Promise<GenerationResult> {
        if (!isSupportedModel(request.model)) {
            throw new ConfigError(
                `Unsupported model "${request.model}". Choose one of: ${SUPPORTED_MODELS.join(", ")}.`
            );
        }

        let response: GeminiResponse;
        try {
            response = await this.models.generateContent({
                model: request.model,
                contents: buildPrompt(request),
                config: { safetySettings: SAFETY_SETTINGS },
            });
        } catch (err) {
            return { ok: false, reason: err instanceof Error ? err.message : String(err) };
        }

        const text = response.text?.trim();
        if (!text) {
            return { ok: false, reason: "empty output", feedback: describeFeedback(response) };
        }
        return { ok: true, text };
    }
}
