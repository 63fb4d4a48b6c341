export interface CompletionOptions {
  signal?: AbortSignal;
}

/**
 * The external model endpoint. Returns the raw response text, which may or
 * may not conform to the requested schema. Transport-level retries and rate
 * limiting are the implementation's concern.
 */
export interface LlmCollaborator {
  complete(prompt: string, schemaHint: string, options?: CompletionOptions): Promise<string>;
}
