// embedder.ts - optional text embeddings for memory search/store

import { z } from "zod";
import { assertLocalEndpoint, FetchLike, postJson } from "./llm_client";
import { createLogger, Logger } from "./logger";

export interface Embedder {
    /** Vector for the text, or null when the capability is unavailable right now. */
    embed(text: string): Promise<number[] | null>;
}

const embeddingResponseSchema = z.object({
    embedding: z.array(z.number()).min(1),
});

export interface OllamaEmbedderConfig {
    baseUrl: string;
    model: string;
    timeoutMs?: number;
    allowRemote?: boolean;
    fetchImpl?: FetchLike;
    logger?: Logger;
}

export class OllamaEmbedder implements Embedder {
    private readonly endpoint: string;
    private readonly model: string;
    private readonly timeoutMs: number;
    private readonly fetchImpl: FetchLike;
    private readonly log: Logger;

    constructor(config: OllamaEmbedderConfig) {
        assertLocalEndpoint(config.baseUrl, config.allowRemote ?? false);
        this.endpoint = `${config.baseUrl.replace(/\/+$/, "")}/api/embeddings`;
        this.model = config.model;
        this.timeoutMs = config.timeoutMs ?? 5000;
        this.fetchImpl = config.fetchImpl ?? fetch;
        this.log = config.logger ?? createLogger("embedder");
    }

    async embed(text: string): Promise<number[] | null> {
        const res = await postJson(this.fetchImpl, this.endpoint, { model: this.model, prompt: text }, this.timeoutMs);
        if (!res.ok) {
            this.log.debug("Embedding unavailable", { message: res.message, http_status: res.status });
            return null;
        }
        const parsed = embeddingResponseSchema.safeParse(res.json);
        if (!parsed.success) {
            this.log.warn("Embedding response malformed");
            return null;
        }
        return parsed.data.embedding;
    }
}
