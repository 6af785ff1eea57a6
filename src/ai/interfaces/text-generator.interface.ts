export const TEXT_GENERATOR = 'TEXT_GENERATOR';

export interface GenerateRequest {
  readonly model: string;
  readonly prompt: string;
  readonly systemPrompt?: string;
  /** Ask the model for a JSON document instead of prose. */
  readonly json?: boolean;
  readonly timeoutMs?: number;
}

export interface TextGenerator {
  generate(request: GenerateRequest): Promise<string>;
}
