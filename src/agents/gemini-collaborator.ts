import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type { CompletionOptions, LlmCollaborator } from './llm-collaborator';
import { CollaboratorUnavailableError, WorkflowCancelledError } from '../orchestrator/errors';

export interface GeminiCollaboratorOptions {
  apiKey: string;
  model: string;
  temperature?: number;
  maxOutputTokens?: number;
  timeoutMs?: number;
  baseUrl?: string;
}

type GeminiGenerateContentResponse = {
  candidates?: Array<{
    content?: {
      parts?: Array<{ text?: string }>;
    };
    finishReason?: string;
  }>;
};

type HttpFailure = {
  message: string;
  code?: string;
  response?: { status: number; statusText?: string; data?: unknown };
};

/**
 * LLM collaborator backed by the Gemini `generateContent` endpoint.
 * One HTTP request per call; no retries.
 */
export class GeminiCollaborator implements LlmCollaborator {
  private http: AxiosInstance;

  constructor(private options: GeminiCollaboratorOptions) {
    if (!options.apiKey) {
      throw new Error('Gemini API key is required');
    }
    this.http = axios.create({
      baseURL: options.baseUrl ?? 'https://generativelanguage.googleapis.com/v1beta',
      timeout: options.timeoutMs ?? 120_000,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  async complete(prompt: string, schemaHint: string, options?: CompletionOptions): Promise<string> {
    let data: GeminiGenerateContentResponse;
    try {
      const response = await this.http.post<GeminiGenerateContentResponse>(
        `/models/${encodeURIComponent(this.options.model)}:generateContent`,
        {
          systemInstruction: { parts: [{ text: `Respond only with JSON matching this shape:\n${schemaHint}` }] },
          contents: [{ role: 'user', parts: [{ text: prompt }] }],
          generationConfig: {
            temperature: this.options.temperature ?? 0.2,
            maxOutputTokens: this.options.maxOutputTokens ?? 8192,
            responseMimeType: 'application/json',
          },
        },
        { params: { key: this.options.apiKey }, signal: options?.signal },
      );
      data = response.data;
    } catch (err) {
      if (options?.signal?.aborted) {
        throw new WorkflowCancelledError();
      }
      throw toCollaboratorError(err);
    }

    const text =
      data.candidates?.[0]?.content?.parts
        ?.map((p) => p.text)
        .filter((t): t is string => typeof t === 'string' && t.length > 0)
        .join('') ?? '';

    if (!text) {
      const reason = data.candidates?.[0]?.finishReason;
      throw new CollaboratorUnavailableError('llm', `Gemini API returned empty text${reason ? ` (finish reason: ${reason})` : ''}`);
    }

    return text;
  }
}

function isHttpFailure(err: unknown): err is HttpFailure {
  if (typeof err !== 'object' || err === null || !('message' in err) || typeof err.message !== 'string') return false;
  if (!('response' in err) || err.response === undefined) return true;
  return typeof err.response === 'object' && err.response !== null && 'status' in err.response && typeof err.response.status === 'number';
}

function toCollaboratorError(err: unknown): CollaboratorUnavailableError {
  if (!isHttpFailure(err)) {
    return new CollaboratorUnavailableError('llm', `Gemini request failed: ${String(err)}`, undefined, err);
  }
  if (err.response) {
    const { status, statusText } = err.response;
    return new CollaboratorUnavailableError('llm', `Gemini API error ${status}${statusText ? ` ${statusText}` : ''}`, status, err);
  }
  const code = err.code ? ` [${err.code}]` : '';
  return new CollaboratorUnavailableError('llm', `Gemini API unreachable${code}: ${err.message}`, undefined, err);
}
