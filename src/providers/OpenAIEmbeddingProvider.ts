/**
 * OpenAI embedding provider for course chunks and queries.
 * Batches are split so large course documents stay under the per-request input limit.
 */

import OpenAI from 'openai';
import { ModelResponseError } from '../errors.js';
import type { IEmbeddingProvider } from './IEmbeddingProvider.js';

const DEFAULT_MODEL = 'text-embedding-3-small';
const DEFAULT_DIMENSIONS = 1536;
const MAX_INPUTS_PER_REQUEST = 256;

export interface OpenAIEmbeddingProviderOptions {
  client?: OpenAI;
  apiKey?: string;
  model?: string;
  dimensions?: number;
}

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  private readonly client: OpenAI;
  private readonly model: string;
  readonly dimensions: number;

  constructor(opts?: OpenAIEmbeddingProviderOptions) {
    this.client = opts?.client ?? new OpenAI({ apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY });
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.dimensions = opts?.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async generate(text: string): Promise<number[]> {
    const [embedding] = await this.embed([text]);
    if (!embedding) {
      throw new ModelResponseError('Embedding response was empty', { model: this.model });
    }
    return embedding;
  }

  async generateBatch(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += MAX_INPUTS_PER_REQUEST) {
      vectors.push(...(await this.embed(texts.slice(i, i + MAX_INPUTS_PER_REQUEST))));
    }
    return vectors;
  }

  private async embed(input: string[]): Promise<number[][]> {
    if (input.length === 0) return [];

    const response = await this.client.embeddings.create({
      model: this.model,
      input,
      dimensions: this.dimensions,
      encoding_format: 'float',
    });

    // Vectors come back tagged with their input index
    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((d) => d.embedding);
  }
}
