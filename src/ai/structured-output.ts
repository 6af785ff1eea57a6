import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';

const FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

/**
 * Parses a model's JSON answer into `cls`. Returns the validation problem
 * as a string instead of throwing, since callers feed it back to the model.
 */
export function parseStructured<T extends object>(
  cls: ClassConstructor<T>,
  raw: string,
): { value: T } | { problem: string } {
  const trimmed = raw.trim();
  const body = FENCE.exec(trimmed)?.[1] ?? trimmed;

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return { problem: 'Response was not valid JSON.' };
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { problem: 'Response was not a JSON object.' };
  }

  const value = plainToInstance(cls, parsed);
  const errors = validateSync(value);
  if (errors.length > 0) {
    const fields = errors.map((error) => error.property).join(', ');
    return { problem: `Response had invalid fields: ${fields}.` };
  }
  return { value };
}
