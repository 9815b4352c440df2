import { z } from 'zod';
import type {
  Bindable,
  CrossFieldDefinition,
  CrossFieldFn,
  ExtractFn,
  ExtractorDefinition,
  TransformDefinition,
  TransformFn,
  ValidateFn,
  ValidatorDefinition
} from '../types';

/**
 * Wrap a rule factory so its params are validated once, when the
 * configuration is compiled, and the row-time function is already bound.
 */
export function defineRule<S extends z.ZodTypeAny, F>(
  schema: S,
  build: (params: z.output<S>) => F
): Bindable<F> {
  return {
    bind(params: unknown) {
      const parsed = schema.safeParse(params ?? {});
      if (!parsed.success) {
        return {
          success: false,
          error: parsed.error.issues
            .map(issue => `${issue.path.join('.') || 'params'}: ${issue.message}`)
            .join('; ')
        };
      }
      try {
        return { success: true, fn: build(parsed.data) };
      } catch (error) {
        return { success: false, error: error instanceof Error ? error.message : String(error) };
      }
    }
  };
}

export const NoParams = z.object({}).strict();

export function defineExtractor<S extends z.ZodTypeAny>(
  schema: S,
  build: (params: z.output<S>) => ExtractFn
): ExtractorDefinition {
  return defineRule(schema, build);
}

export function defineTransform<S extends z.ZodTypeAny>(
  schema: S,
  build: (params: z.output<S>) => TransformFn
): TransformDefinition {
  return defineRule(schema, build);
}

export function defineValidator<S extends z.ZodTypeAny>(
  schema: S,
  build: (params: z.output<S>) => ValidateFn
): ValidatorDefinition {
  return defineRule(schema, build);
}

export function defineCrossFieldRule<S extends z.ZodTypeAny>(
  schema: S,
  build: (params: z.output<S>) => CrossFieldFn
): CrossFieldDefinition {
  return defineRule(schema, build);
}
