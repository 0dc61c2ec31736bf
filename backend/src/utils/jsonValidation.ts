import AjvModule from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';

// ajv is CommonJS; under NodeNext the class sits on `default`
const Ajv = AjvModule.default;

// Defaults also replace null and "", which clients send for unset values.
// Closed objects (`additionalProperties: false`) lose unknown keys.
const ajv = new Ajv({ allErrors: true, strict: false, useDefaults: 'empty', removeAdditional: true });

export type { SchemaObject };

export type ValidationResult<T> = { valid: true; data: T } | { valid: false; errors: string[] };

export type Validator<T> = (value: unknown) => ValidationResult<T>;

/** `port: must be integer`, with `(root)` for the value itself. */
export function describeErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors || []).map(
    (err) => `${err.instancePath.slice(1).replace(/\//g, '.') || '(root)'}: ${err.message || 'is invalid'}`
  );
}

/**
 * Compiles `schema` once. Validation applies defaults and removals to the
 * value it is given; pass a copy where the original must stay untouched.
 */
export function compileValidator<T>(schema: SchemaObject): Validator<T> {
  const validate: ValidateFunction<T> = ajv.compile<T>(schema);
  return (value) => {
    if (validate(value)) return { valid: true, data: value };
    return { valid: false, errors: describeErrors(validate.errors) };
  };
}
