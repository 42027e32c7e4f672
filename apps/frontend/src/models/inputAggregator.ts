import { z } from 'zod';
import { DomainError, InvalidInputError } from './errors';
import { FIELD_SPECS } from './fields';
import type { FieldIssue, InputFields, InputKey, InputRecord } from './types';

function fieldSchema(key: InputKey) {
  const spec = FIELD_SPECS.find((s) => s.key === key);
  if (!spec) throw new Error(`No field spec for ${key}`);

  const base = z
    .number({
      required_error: `${spec.label} is required`,
      invalid_type_error: `${spec.label} must be a number`,
    })
    .finite(`${spec.label} must be finite`);

  if (spec.min === undefined) return base;
  return spec.exclusiveMin
    ? base.gt(spec.min, `${spec.label} must be greater than ${spec.min}`)
    : base.gte(spec.min, `${spec.label} must be at least ${spec.min}`);
}

const inputFieldsSchema = z.object({
  Da: fieldSchema('Da'),
  Db: fieldSchema('Db'),
  L: fieldSchema('L'),
  r: fieldSchema('r'),
  Lfa: fieldSchema('Lfa'),
  Lfb: fieldSchema('Lfb'),
  Fa: fieldSchema('Fa'),
  Fb: fieldSchema('Fb'),
  UTS: fieldSchema('UTS'),
  Sy: fieldSchema('Sy'),
  a: fieldSchema('a'),
  b: fieldSchema('b'),
}) satisfies z.ZodType<InputFields>;

/**
 * Theoretical stress concentration factor for the shoulder fillet.
 *
 * Closed-form stand-in for reading the Kt chart; kept as-is so results stay
 * comparable with existing calculations.
 */
export function computeKt(Dd: number, rd: number): number {
  if (!(rd > 0)) {
    throw new DomainError(`r/d ratio must be positive to compute Kt (got ${rd})`);
  }
  return 1 + 0.5 * (Dd - 1) * (1 + 1 / Math.sqrt(rd));
}

/**
 * Validates the raw form values and derives the diameter ratio, the
 * radius ratio and Kt.
 *
 * @throws InvalidInputError when a field is missing or out of range.
 * @throws DomainError when the radius ratio leaves Kt undefined.
 */
export function buildInput(fields: Record<string, unknown>): InputRecord {
  const parsed = inputFieldsSchema.safeParse(fields);
  if (!parsed.success) {
    const issues: FieldIssue[] = parsed.error.issues.map((issue) => ({
      field: String(issue.path[0] ?? ''),
      message: issue.message,
    }));
    throw new InvalidInputError(issues);
  }

  const values = parsed.data;
  if (values.Db === 0) {
    throw new DomainError('Smaller diameter must be non-zero');
  }

  const Dd_ratio = values.Da / values.Db;
  const rd_ratio = values.r / values.Db;

  return Object.freeze({
    ...values,
    Dd_ratio,
    rd_ratio,
    Kt: computeKt(Dd_ratio, rd_ratio),
  });
}
