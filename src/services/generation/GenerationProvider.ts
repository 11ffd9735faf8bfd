/**
 * One structured-output request to a generative model
 */
export interface GenerationRequest {
  system: string;
  prompt: string;
  schemaName: string;
  jsonSchema: Record<string, unknown>;
}

/**
 * Returns the model's parsed JSON output. Callers validate the shape.
 */
export interface GenerationProvider {
  generate(request: GenerationRequest): Promise<unknown>;
}
