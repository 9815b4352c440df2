import type {
  CrossFieldDefinition,
  ExtractorDefinition,
  TransformDefinition,
  ValidatorDefinition
} from '../types';
import { builtInExtractors } from '../extraction/extractors';
import { builtInTransforms } from '../validation/transforms';
import { builtInCrossFieldRules, builtInValidators } from '../validation/SchemaValidator';

type RuleKind = 'extractor' | 'transform' | 'validator' | 'crossField';

/**
 * Name -> rule lookup used when a declarative configuration is compiled.
 * Every registry starts with the built-ins; callers may add their own.
 */
export class RuleRegistry {
  private readonly extractors = new Map<string, ExtractorDefinition>(Object.entries(builtInExtractors));
  private readonly transforms = new Map<string, TransformDefinition>(Object.entries(builtInTransforms));
  private readonly validators = new Map<string, ValidatorDefinition>(Object.entries(builtInValidators));
  private readonly crossFieldRules = new Map<string, CrossFieldDefinition>(Object.entries(builtInCrossFieldRules));

  registerExtractor(name: string, definition: ExtractorDefinition): this {
    this.assertFree('extractor', this.extractors, name);
    this.extractors.set(name, definition);
    return this;
  }

  registerTransform(name: string, definition: TransformDefinition): this {
    this.assertFree('transform', this.transforms, name);
    this.transforms.set(name, definition);
    return this;
  }

  registerValidator(name: string, definition: ValidatorDefinition): this {
    this.assertFree('validator', this.validators, name);
    this.validators.set(name, definition);
    return this;
  }

  registerCrossFieldRule(name: string, definition: CrossFieldDefinition): this {
    this.assertFree('crossField', this.crossFieldRules, name);
    this.crossFieldRules.set(name, definition);
    return this;
  }

  getExtractor(name: string): ExtractorDefinition | undefined {
    return this.extractors.get(name);
  }

  getTransform(name: string): TransformDefinition | undefined {
    return this.transforms.get(name);
  }

  getValidator(name: string): ValidatorDefinition | undefined {
    return this.validators.get(name);
  }

  getCrossFieldRule(name: string): CrossFieldDefinition | undefined {
    return this.crossFieldRules.get(name);
  }

  private assertFree(kind: RuleKind, registry: Map<string, unknown>, name: string): void {
    if (registry.has(name)) {
      throw new Error(`A ${kind} named "${name}" is already registered`);
    }
  }
}
