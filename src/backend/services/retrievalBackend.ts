/**
 * Retrieval Backend
 *
 * The uniform contract every data source satisfies (video transcripts, web
 * pages, PDFs, slide decks all look the same from here), plus the one
 * implementation we ship: a pre-built vector index loaded from disk.
 *
 * An index location is a directory holding `index.json`:
 *
 *   { "version": 1, "embeddingModel": "...", "entries": [
 *       { "id": "...", "content": "...", "embedding": [...], "metadata": {...} } ] }
 *
 * The file is trusted: whoever wrote it decides what the pipeline reads.
 * It is parsed as JSON and schema-checked, never evaluated.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { Snippet } from '../../shared/types';
import { EmbeddingProvider } from '../clients/completionClient';
import { IVectorStore, createVectorStore } from './vectorStore';

export const INDEX_FILE_NAME = 'index.json';

/**
 * A queryable similarity-search index over one document source.
 */
export interface RetrievalBackend {
    readonly sourceName: string;
    /**
     * Return up to `limit` snippets for the query, best match first.
     */
    retrieve(query: string, limit: number, signal?: AbortSignal): Promise<Snippet[]>;
}

/**
 * Opens the backend for one configured source.
 * Throws when the index cannot be loaded; the registry turns that into a
 * per-source load failure.
 */
export type BackendOpener = (
    sourceName: string,
    location: string
) => Promise<RetrievalBackend>;

const metadataSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

const indexFileSchema = z.object({
    version: z.literal(1),
    embeddingModel: z.string().optional(),
    entries: z.array(
        z.object({
            id: z.string().min(1),
            content: z.string(),
            embedding: z.array(z.number()).min(1),
            metadata: metadataSchema.default({}),
        })
    ),
});

export type IndexFile = z.infer<typeof indexFileSchema>;

/**
 * Backend over an in-memory vector store.
 */
export class VectorIndexBackend implements RetrievalBackend {
    constructor(
        public readonly sourceName: string,
        private readonly store: IVectorStore,
        private readonly embeddings: EmbeddingProvider
    ) {}

    async retrieve(query: string, limit: number, signal?: AbortSignal): Promise<Snippet[]> {
        if (this.store.size() === 0 || limit <= 0) {
            return [];
        }

        const queryEmbedding = await this.embeddings.generateEmbedding(query, signal);

        const width = this.store.dimension();
        if (queryEmbedding.length !== width) {
            throw new Error(
                `Query embedding has dimension ${queryEmbedding.length}, index "${this.sourceName}" expects ${width}`
            );
        }

        return this.store.search(queryEmbedding, limit).map(({ entry }) => ({
            sourceName: this.sourceName,
            text: entry.content,
            metadata: { ...entry.metadata },
        }));
    }

    size(): number {
        return this.store.size();
    }
}

/**
 * Parse and validate the contents of an index file.
 *
 * @throws Error describing the first schema violations
 */
export function parseIndexFile(raw: string): IndexFile {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Index file is not valid JSON: ${message}`);
    }

    const parsed = indexFileSchema.safeParse(json);
    if (!parsed.success) {
        const details = parsed.error.issues
            .slice(0, 3)
            .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
            .join('; ');
        throw new Error(`Index file has an invalid shape: ${details}`);
    }
    return parsed.data;
}

/**
 * Load the index stored under `location` and wrap it as a backend.
 *
 * @throws Error if the file is missing, malformed, or mixes embedding widths
 */
export async function openVectorIndexBackend(
    sourceName: string,
    location: string,
    embeddings: EmbeddingProvider
): Promise<VectorIndexBackend> {
    const filePath = path.join(location, INDEX_FILE_NAME);
    const raw = await fs.promises.readFile(filePath, 'utf-8');
    const index = parseIndexFile(raw);

    const store = createVectorStore();
    store.addMany(index.entries);

    return new VectorIndexBackend(sourceName, store, embeddings);
}

/**
 * Build an opener that resolves locations against `indexRoot`.
 */
export function createVectorIndexOpener(
    embeddings: EmbeddingProvider,
    indexRoot: string = process.cwd()
): BackendOpener {
    return (sourceName, location) =>
        openVectorIndexBackend(sourceName, path.resolve(indexRoot, location), embeddings);
}
