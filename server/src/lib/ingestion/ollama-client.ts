import { ActivityError, isTransientHttpStatus, toErrorMessage } from '../errors';

type OllamaEmbedResponse = {
  embedding: unknown;
  error: unknown;
};

export interface OllamaClientOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
}

function buildUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${path}`;
}

async function parseJsonResponse(response: Response): Promise<OllamaEmbedResponse> {
  const payload: unknown = await response.json().catch(() => ({}));
  const body: OllamaEmbedResponse =
    payload && typeof payload === 'object'
      ? { embedding: Reflect.get(payload, 'embedding'), error: Reflect.get(payload, 'error') }
      : { embedding: undefined, error: undefined };

  if (!response.ok) {
    const bodyError =
      typeof body.error === 'string' ? body.error : `HTTP ${response.status} ${response.statusText}`;
    const message = `Ollama embedding request failed: ${bodyError}`;
    throw isTransientHttpStatus(response.status)
      ? ActivityError.transient(message, response.status)
      : ActivityError.permanent(message, response.status);
  }

  return body;
}

export async function ollamaEmbed(
  options: OllamaClientOptions,
  model: string,
  input: string,
  signal?: AbortSignal
): Promise<number[]> {
  const fetchImpl = options.fetchImpl ?? fetch;
  let response: Response;
  try {
    response = await fetchImpl(buildUrl(options.baseUrl, '/api/embeddings'), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model,
        prompt: input,
      }),
      signal,
    });
  } catch (error) {
    // Connection-level failures never reached the model.
    throw ActivityError.transient(`Ollama embedding request failed: ${toErrorMessage(error)}`);
  }

  const payload = await parseJsonResponse(response);
  if (!Array.isArray(payload.embedding)) {
    throw ActivityError.permanent('Ollama embedding response did not include a numeric vector');
  }

  const vector = payload.embedding.map((value) => Number(value));
  const allNumbers = vector.every((value) => Number.isFinite(value));
  if (!allNumbers || vector.length === 0) {
    throw ActivityError.permanent('Ollama embedding vector is empty or contains non-numeric values');
  }

  return vector;
}
