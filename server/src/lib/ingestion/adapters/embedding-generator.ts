import type { EmbeddingProvider } from '../../config';
import { ActivityError, toErrorMessage } from '../../errors';
import { ollamaEmbed, type OllamaClientOptions } from '../ollama-client';

export type EmbeddingResult = {
  model: string;
  dimensions: number;
  vector: number[];
};

export interface EmbeddingGenerator {
  id: EmbeddingProvider;
  embed(input: string, signal?: AbortSignal): Promise<EmbeddingResult>;
}

export interface EmbeddingGeneratorOptions {
  ollama?: OllamaClientOptions & { model: string };
}

class DeterministicEmbeddingGenerator implements EmbeddingGenerator {
  readonly id = 'deterministic-emb-v1';
  readonly dimensions = 128;

  async embed(input: string): Promise<EmbeddingResult> {
    const vector = new Array<number>(this.dimensions).fill(0);

    for (let i = 0; i < input.length; i += 1) {
      const vectorIndex = i % this.dimensions;
      const code = input.charCodeAt(i);
      vector[vectorIndex] += (code % 31) / 31;
    }

    const magnitude = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0)) || 1;
    const normalized = vector.map((value) => value / magnitude);

    return {
      model: this.id,
      dimensions: this.dimensions,
      vector: normalized,
    };
  }
}

class OllamaEmbeddingGenerator implements EmbeddingGenerator {
  readonly id = 'ollama-emb-v1';

  constructor(private readonly options: OllamaClientOptions & { model: string }) {}

  async embed(input: string, signal?: AbortSignal): Promise<EmbeddingResult> {
    try {
      const vector = await ollamaEmbed(this.options, this.options.model, input, signal);
      return {
        model: this.options.model,
        dimensions: vector.length,
        vector,
      };
    } catch (error) {
      const reason = toErrorMessage(error);
      console.error(`[ingestion][embedding] provider=${this.id} model=${this.options.model} failed: ${reason}`);
      const message = `Embedding generation failed for provider "${this.id}" and model "${this.options.model}": ${reason}`;
      throw error instanceof ActivityError
        ? new ActivityError(message, error.kind, error.status)
        : ActivityError.permanent(message);
    }
  }
}

export function createEmbeddingGenerator(
  providerId: EmbeddingProvider,
  options: EmbeddingGeneratorOptions = {}
): EmbeddingGenerator {
  if (providerId === 'ollama-emb-v1') {
    if (!options.ollama) {
      throw new Error('Ollama embedding provider requires a base URL and model');
    }
    return new OllamaEmbeddingGenerator(options.ollama);
  }

  return new DeterministicEmbeddingGenerator();
}
