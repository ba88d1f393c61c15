import type { Language } from "../config/types.js";

export type GenerationKind = "commit-message" | "branch-name";

export interface GenerationRequest {
    kind: GenerationKind;
    diff: string;
    language: Language;
    /** Checked against the supported models by the client before any request. */
    model: string;
}

export type GenerationResult =
    | { ok: true; text: string }
    | { ok: false; reason: string; feedback?: string };

export interface TextGenerator {
    generate(request: GenerationRequest): Promise<GenerationResult>;
}
