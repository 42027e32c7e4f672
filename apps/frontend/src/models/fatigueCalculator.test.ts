import { describe, it, expect } from 'vitest';
import { calculate, neuberConstant, sizeFactor } from './fatigueCalculator';
import { buildInput } from './inputAggregator';
import { FIELD_SPECS, defaultInputFields } from './fields';
import type { InputFields } from './types';

function inputWith(overrides: Partial<InputFields>) {
  return buildInput({ ...defaultInputFields(), ...overrides });
}

function expectRelClose(actual: number | undefined, expected: number) {
  expect(actual).toBeDefined();
  expect(Math.abs(((actual ?? Number.NaN) - expected) / expected)).toBeLessThan(1e-6);
}

describe('calculate – default shaft', () => {
  const input = buildInput(defaultInputFields());
  const result = calculate(input);

  it('matches the hand-checked values', () => {
    expectRelClose(input.Kt, 1.3999362178478973);
    expect(result.Se_prime).toBe(345);
    expectRelClose(result.ka, 0.797777039378126);
    expectRelClose(result.kb, 0.8402041848559617);
    expectRelClose(result.Se, 231.25198443828782);
    expectRelClose(result.NeuberConstant, 0.314242801);
    expectRelClose(result.Kf, 1.3385192849153038);
    expectRelClose(result.BendingMoment, 363.6363636363636);
    expectRelClose(result.SectionModulus, 3216.990877275948);
    expectRelClose(result.AlternatingStress, 0.15130110839353667);
    expectRelClose(result.SafetyFactor, 1528.4222759082347);
  });

  it('chains Se and the safety factor from their parts', () => {
    expect(result.Se).toBe(result.ka * result.kb * result.Se_prime);
    expect(result.SafetyFactor).toBe(result.Se / (result.AlternatingStress ?? Number.NaN));
  });

  it('returns a frozen record', () => {
    expect(Object.isFrozen(result)).toBe(true);
  });
});

describe('Se_prime', () => {
  it.each([150, 340, 690, 1200, 2500])('is half of UTS = %s', (UTS) => {
    expect(calculate(inputWith({ UTS })).Se_prime).toBe(0.5 * UTS);
  });
});

describe('sizeFactor', () => {
  const small = (Da: number) => 1.24 * Math.pow(Da, -0.107);
  const large = (Da: number) => 1.51 * Math.pow(Da, -0.157);

  it('uses the small-diameter fit on both inclusive bounds', () => {
    expect(sizeFactor(7.62)).toBe(small(7.62));
    expect(sizeFactor(51)).toBe(small(51));
  });

  it('falls through to the large-diameter fit just outside the bounds', () => {
    expect(sizeFactor(7.61)).toBe(large(7.61));
    expect(sizeFactor(51.01)).toBe(large(51.01));
  });

  it('has no third regime for very small or very large shafts', () => {
    expect(sizeFactor(1)).toBe(1.51);
    expect(sizeFactor(400)).toBe(large(400));
  });

  it('is what calculate reports as kb', () => {
    expect(calculate(inputWith({ Da: 51 })).kb).toBe(small(51));
    expect(calculate(inputWith({ Da: 51.01 })).kb).toBe(large(51.01));
  });
});

describe('NeuberConstant', () => {
  it.each([
    { UTS: 339.999, defined: false },
    { UTS: 340, defined: true },
    { UTS: 1700, defined: true },
    { UTS: 1700.001, defined: false },
  ])('at UTS = $UTS defined: $defined', ({ UTS, defined }) => {
    const result = calculate(inputWith({ UTS }));
    expect(result.NeuberConstant !== undefined).toBe(defined);
    expect(result.Kf !== undefined).toBe(defined);
    expect(result.AlternatingStress !== undefined).toBe(defined);
  });

  it('evaluates the cubic fit', () => {
    // 1.24 - 2.25 + 1.6 - 0.411
    expect(neuberConstant(1000)).toBeCloseTo(0.179, 12);
  });

  it('is undefined for NaN', () => {
    expect(neuberConstant(Number.NaN)).toBeUndefined();
  });
});

describe('SafetyFactor', () => {
  it('is undefined when the alternating stress is undefined', () => {
    const result = calculate(inputWith({ UTS: 300 }));
    expect(result.AlternatingStress).toBeUndefined();
    expect(result.SafetyFactor).toBeUndefined();
    expect(result.Se).toBeGreaterThan(0);
  });

  it('is undefined when the alternating stress is zero', () => {
    // 250 * 550 / 550 - 250 = 0
    const result = calculate(inputWith({ Lfa: 250, Fb: 550, L: 550 }));
    expect(result.BendingMoment).toBe(0);
    expect(result.AlternatingStress).toBe(0);
    expect(result.SafetyFactor).toBeUndefined();
  });

  it('goes negative with a negative bending moment', () => {
    const result = calculate(inputWith({ Fb: -1500 }));
    expect(result.BendingMoment).toBeLessThan(0);
    expect(result.SafetyFactor).toBe(result.Se / (result.AlternatingStress ?? Number.NaN));
    expect(result.SafetyFactor).toBeLessThan(0);
  });
});

describe('single-field changes', () => {
  const probes = (min: number | undefined) =>
    min === undefined ? [-1e6, -1, 0, 1, 1e6] : [min + 1e-3, min + 1, 1e3, 1e6];

  for (const spec of FIELD_SPECS) {
    it(`never throws when ${spec.key} changes`, () => {
      for (const value of probes(spec.min)) {
        const overrides: Partial<InputFields> = {};
        overrides[spec.key] = value;
        expect(() => calculate(inputWith(overrides))).not.toThrow();
      }
    });
  }
});
