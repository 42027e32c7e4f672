import type { DerivedInputKey, FieldGroup, FieldSpec, InputFields, InputKey } from './types';

export const FIELD_SPECS: readonly FieldSpec[] = [
  { key: 'Da', label: 'Larger diameter', unit: 'mm', group: 'geometry', defaultValue: 38.0, min: 0.1, exclusiveMin: true, step: 0.1 },
  { key: 'Db', label: 'Smaller diameter', unit: 'mm', group: 'geometry', defaultValue: 32.0, min: 0.1, exclusiveMin: true, step: 0.1 },
  { key: 'L', label: 'Shaft length', unit: 'mm', group: 'geometry', defaultValue: 550.0, min: 0.1, exclusiveMin: true, step: 1 },
  { key: 'r', label: 'Fillet radius', unit: 'mm', group: 'geometry', defaultValue: 3.0, min: 0.1, exclusiveMin: true, step: 0.1 },
  { key: 'Lfa', label: 'Load A position', unit: 'mm', group: 'geometry', defaultValue: 225.0, min: 0, step: 1 },
  { key: 'Lfb', label: 'Load B position', unit: 'mm', group: 'geometry', defaultValue: 300.0, min: 0, step: 1 },
  { key: 'Fa', label: 'Load A', unit: 'N', group: 'loads', defaultValue: 1000.0, step: 10 },
  { key: 'Fb', label: 'Load B', unit: 'N', group: 'loads', defaultValue: 1500.0, step: 10 },
  { key: 'UTS', label: 'Ultimate tensile strength', unit: 'MPa', group: 'material', defaultValue: 690.0, min: 100, exclusiveMin: true, step: 1 },
  { key: 'Sy', label: 'Yield strength', unit: 'MPa', group: 'material', defaultValue: 490.0, min: 100, exclusiveMin: true, step: 1 },
  { key: 'a', label: 'Surface factor coefficient', unit: '-', group: 'material', defaultValue: 4.51, step: 0.01 },
  { key: 'b', label: 'Surface factor exponent', unit: '-', group: 'material', defaultValue: -0.265, step: 0.001 },
];

export const DERIVED_INPUT_UNITS: Record<DerivedInputKey, string> = {
  Dd_ratio: '-',
  rd_ratio: '-',
  Kt: '-',
};

export const GROUP_LABELS: Record<FieldGroup, string> = {
  geometry: 'Shaft Geometry',
  loads: 'Loads',
  material: 'Material',
};

export function isInputKey(value: string): value is InputKey {
  return FIELD_SPECS.some((spec) => spec.key === value);
}

export function defaultInputFields(): InputFields {
  return {
    Da: 38.0,
    Db: 32.0,
    L: 550.0,
    r: 3.0,
    Lfa: 225.0,
    Lfb: 300.0,
    Fa: 1000.0,
    Fb: 1500.0,
    UTS: 690.0,
    Sy: 490.0,
    a: 4.51,
    b: -0.265,
  };
}

/** Strips derived values, leaving only the raw form fields. */
export function rawInputFields(record: InputFields): InputFields {
  return {
    Da: record.Da,
    Db: record.Db,
    L: record.L,
    r: record.r,
    Lfa: record.Lfa,
    Lfb: record.Lfb,
    Fa: record.Fa,
    Fb: record.Fb,
    UTS: record.UTS,
    Sy: record.Sy,
    a: record.a,
    b: record.b,
  };
}
