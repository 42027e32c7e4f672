import { describe, it, expect } from 'vitest';
import { buildInput, computeKt } from './inputAggregator';
import { DomainError, InvalidInputError, ShaftCalcError } from './errors';
import { FIELD_SPECS, defaultInputFields } from './fields';

function expectInvalid(fields: Record<string, unknown>): InvalidInputError {
  try {
    buildInput(fields);
  } catch (err) {
    expect(err).toBeInstanceOf(InvalidInputError);
    if (err instanceof InvalidInputError) return err;
  }
  throw new Error('buildInput did not throw');
}

describe('computeKt', () => {
  it('applies the closed-form fillet approximation', () => {
    // 1 + 0.5 * 0.2 * (1 + 1/0.5) = 1.3
    expect(computeKt(1.2, 0.25)).toBeCloseTo(1.3, 12);
  });

  it('returns exactly 1 for a plain shaft', () => {
    expect(computeKt(1, 0.1)).toBe(1);
  });

  it('throws DomainError when the radius ratio is not positive', () => {
    expect(() => computeKt(1.2, 0)).toThrow(DomainError);
    expect(() => computeKt(1.2, -0.5)).toThrow('r/d ratio must be positive to compute Kt (got -0.5)');
  });
});

describe('buildInput', () => {
  it('derives ratios and Kt for the default shaft', () => {
    const input = buildInput(defaultInputFields());

    expect(input.Dd_ratio).toBe(1.1875);
    expect(input.rd_ratio).toBe(0.09375);
    expect(input.Kt).toBeCloseTo(1.3999362178478973, 12);
    expect(input.Da).toBe(38);
    expect(input.b).toBe(-0.265);
  });

  it('returns a frozen record', () => {
    expect(Object.isFrozen(buildInput(defaultInputFields()))).toBe(true);
  });

  it('keeps the field table defaults and defaultInputFields in step', () => {
    const defaults = defaultInputFields();
    for (const spec of FIELD_SPECS) {
      expect(defaults[spec.key]).toBe(spec.defaultValue);
    }
  });

  it('reports a missing field', () => {
    const fields: Record<string, unknown> = { ...defaultInputFields() };
    delete fields.Da;

    const err = expectInvalid(fields);
    expect(err.code).toBe('INVALID_INPUT');
    expect(err.issues).toEqual([{ field: 'Da', message: 'Larger diameter is required' }]);
  });

  it('rejects a diameter at the exclusive minimum', () => {
    const err = expectInvalid({ ...defaultInputFields(), Db: 0.1 });
    expect(err.issues).toEqual([{ field: 'Db', message: 'Smaller diameter must be greater than 0.1' }]);
  });

  it('rejects strengths at or below 100 MPa', () => {
    const err = expectInvalid({ ...defaultInputFields(), UTS: 100 });
    expect(err.issues).toEqual([{ field: 'UTS', message: 'Ultimate tensile strength must be greater than 100' }]);
  });

  it('accepts a load position of zero but not below', () => {
    expect(buildInput({ ...defaultInputFields(), Lfa: 0 }).Lfa).toBe(0);

    const err = expectInvalid({ ...defaultInputFields(), Lfa: -1 });
    expect(err.issues).toEqual([{ field: 'Lfa', message: 'Load A position must be at least 0' }]);
  });

  it('accepts negative loads and surface exponents', () => {
    const input = buildInput({ ...defaultInputFields(), Fa: -500, Fb: -1500, b: -0.995 });
    expect(input.Fb).toBe(-1500);
  });

  it('rejects NaN, infinities and strings', () => {
    const err = expectInvalid({ ...defaultInputFields(), r: Number.NaN, L: Number.POSITIVE_INFINITY, Fa: '1000' });

    expect(err.issues).toEqual([
      { field: 'L', message: 'Shaft length must be finite' },
      { field: 'r', message: 'Fillet radius must be a number' },
      { field: 'Fa', message: 'Load A must be a number' },
    ]);
    expect(err.message).toBe(
      'L: Shaft length must be finite; r: Fillet radius must be a number; Fa: Load A must be a number',
    );
  });

  it('uses a common base class for its errors', () => {
    const err = expectInvalid({});
    expect(err).toBeInstanceOf(ShaftCalcError);
    expect(err.name).toBe('InvalidInputError');
    expect(err.issues).toHaveLength(12);
  });
});
