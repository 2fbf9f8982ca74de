// Shared result and error types for the content engine modules

export type ModuleName = 'OUTLINE' | 'PROMPTS' | 'LLM' | 'CACHE' | 'WALKER' | 'SERIALIZER' | 'PIPELINE';

export type ModuleError = {
  code: string;
  module: ModuleName;
  data: Record<string, unknown>;
  correlationId: string;
};

export type GenerationStage = 'roadmap' | 'lesson-plan' | 'lecture-notes' | 'question';

/**
 * An LLM call that failed or produced unusable output
 */
export interface GenerationFailure {
  code: string;
  stage?: GenerationStage;
  nodeId?: string;
  cause: string;
}

export type ValidationResult = {
  valid: boolean;
  errors?: string[];
};

export type Result<T, E> =
  | { success: true; value: T }
  | { success: false; errors: E };

export function Ok<T>(value: T): Result<T, never> {
  return { success: true, value };
}

export function Err<E>(errors: E): Result<never, E> {
  return { success: false, errors };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function generateCorrelationId(prefix: string = 'notes'): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 11);
  return `${prefix}-${timestamp}-${random}`;
}
