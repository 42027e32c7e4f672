import { FIELD_SPECS, DERIVED_INPUT_UNITS } from './fields';
import type { InputRecord, ReportRow, ResultRecord, SafetyAssessment } from './types';

export const NOT_AVAILABLE = 'N/A';

export function formatValue(value: number | undefined, digits = 3): string {
  if (value === undefined) return NOT_AVAILABLE;
  return value.toFixed(digits);
}

export function inputRows(input: InputRecord): ReportRow[] {
  return [
    ...FIELD_SPECS.map((spec) => ({
      parameter: spec.key,
      value: formatValue(input[spec.key]),
      unit: spec.unit,
    })),
    { parameter: 'Dd_ratio', value: formatValue(input.Dd_ratio), unit: DERIVED_INPUT_UNITS.Dd_ratio },
    { parameter: 'rd_ratio', value: formatValue(input.rd_ratio), unit: DERIVED_INPUT_UNITS.rd_ratio },
    { parameter: 'Kt', value: formatValue(input.Kt), unit: DERIVED_INPUT_UNITS.Kt },
  ];
}

export function fatigueStrengthRows(result: ResultRecord): ReportRow[] {
  return [
    { parameter: "Se'", value: formatValue(result.Se_prime), unit: 'MPa' },
    { parameter: 'ka', value: formatValue(result.ka), unit: '-' },
    { parameter: 'kb', value: formatValue(result.kb), unit: '-' },
    { parameter: 'Se', value: formatValue(result.Se), unit: 'MPa' },
  ];
}

export function stressAnalysisRows(input: InputRecord, result: ResultRecord): ReportRow[] {
  return [
    { parameter: 'Kt', value: formatValue(input.Kt), unit: '-' },
    { parameter: 'Neuber constant', value: formatValue(result.NeuberConstant), unit: '√mm' },
    { parameter: 'Kf', value: formatValue(result.Kf), unit: '-' },
    { parameter: 'Bending Moment', value: formatValue(result.BendingMoment), unit: 'N·m' },
    { parameter: 'Section Modulus', value: formatValue(result.SectionModulus), unit: 'mm³' },
    { parameter: 'σa', value: formatValue(result.AlternatingStress), unit: 'MPa' },
  ];
}

export function assessSafety(safetyFactor: number | undefined): SafetyAssessment {
  if (safetyFactor === undefined || Number.isNaN(safetyFactor)) {
    return { status: 'unavailable', message: 'Unable to calculate Safety Factor. Check inputs.' };
  }
  if (safetyFactor > 1) {
    return { status: 'safe', message: 'Shaft is SAFE (Safety Factor > 1.0)' };
  }
  if (safetyFactor === 1) {
    return { status: 'critical', message: 'Shaft is at CRITICAL LIMIT (Safety Factor = 1.0)' };
  }
  return { status: 'unsafe', message: 'Shaft is UNSAFE (Safety Factor < 1.0)' };
}
