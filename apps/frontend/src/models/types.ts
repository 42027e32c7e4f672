export type InputKey =
  | 'Da'
  | 'Db'
  | 'L'
  | 'r'
  | 'Lfa'
  | 'Lfb'
  | 'Fa'
  | 'Fb'
  | 'UTS'
  | 'Sy'
  | 'a'
  | 'b';

export type InputFields = Record<InputKey, number>;

export type FieldGroup = 'geometry' | 'loads' | 'material';

export interface FieldSpec {
  key: InputKey;
  label: string;
  unit: string;
  group: FieldGroup;
  defaultValue: number;
  /** Lower bound; absent means any finite value is accepted. */
  min?: number;
  /** When true the bound itself is rejected (value must be strictly greater). */
  exclusiveMin?: boolean;
  step: number;
}

export interface InputRecord extends InputFields {
  Dd_ratio: number;
  rd_ratio: number;
  Kt: number;
}

export type DerivedInputKey = 'Dd_ratio' | 'rd_ratio' | 'Kt';

/**
 * Conditional fields hold `undefined` when their formula's precondition fails.
 * NaN is never used as that marker; a NaN here came from the arithmetic itself.
 */
export interface ResultRecord {
  Se_prime: number;
  ka: number;
  kb: number;
  Se: number;
  NeuberConstant: number | undefined;
  Kf: number | undefined;
  BendingMoment: number;
  SectionModulus: number;
  AlternatingStress: number | undefined;
  SafetyFactor: number | undefined;
}

export interface FieldIssue {
  field: string;
  message: string;
}

export type SafetyStatus = 'safe' | 'critical' | 'unsafe' | 'unavailable';

export interface SafetyAssessment {
  status: SafetyStatus;
  message: string;
}

export interface ReportRow {
  parameter: string;
  value: string;
  unit: string;
}
