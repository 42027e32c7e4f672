import type { InputRecord, ResultRecord } from './types';

// Size-factor regime for diameters in mm.
const KB_SMALL_MIN_DA = 7.62;
const KB_SMALL_MAX_DA = 51;

// Neuber constant polynomial is fitted for steels in this UTS range (MPa).
const NEUBER_MIN_UTS = 340;
const NEUBER_MAX_UTS = 1700;

// Fixed offset subtracted from the load moment; carried over unchanged.
const BENDING_MOMENT_OFFSET = 250;

export function surfaceFactor(a: number, b: number, UTS: number): number {
  return a * Math.pow(UTS, b);
}

/** Size factor; anything outside 7.62–51 mm takes the large-diameter fit. */
export function sizeFactor(Da: number): number {
  if (Da >= KB_SMALL_MIN_DA && Da <= KB_SMALL_MAX_DA) {
    return 1.24 * Math.pow(Da, -0.107);
  }
  return 1.51 * Math.pow(Da, -0.157);
}

export function neuberConstant(UTS: number): number | undefined {
  if (!(UTS >= NEUBER_MIN_UTS && UTS <= NEUBER_MAX_UTS)) return undefined;
  return 1.24 - 2.25e-3 * UTS + 1.6e-6 * UTS ** 2 - 4.11e-10 * UTS ** 3;
}

export function fatigueConcentrationFactor(Kt: number, r: number, nc: number | undefined): number | undefined {
  if (nc === undefined) return undefined;
  return 1 + (Kt - 1) / (1 + nc / Math.sqrt(r));
}

export function sectionModulus(d: number): number {
  return (Math.PI * d ** 3) / 32;
}

/**
 * Runs the fatigue pipeline for one input snapshot.
 *
 * Never throws: fields whose precondition fails come back `undefined`, and
 * NaN or Infinity from non-physical inputs is passed through as computed.
 */
export function calculate(input: InputRecord): ResultRecord {
  const Se_prime = 0.5 * input.UTS;
  const ka = surfaceFactor(input.a, input.b, input.UTS);
  const kb = sizeFactor(input.Da);
  const Se = ka * kb * Se_prime;

  const NeuberConstant = neuberConstant(input.UTS);
  const Kf = fatigueConcentrationFactor(input.Kt, input.r, NeuberConstant);

  const BendingMoment = (input.Lfa * input.Fb) / input.L - BENDING_MOMENT_OFFSET;
  const SectionModulus = sectionModulus(input.Db);

  const AlternatingStress = Kf === undefined ? undefined : (Kf * BendingMoment) / SectionModulus;
  const SafetyFactor =
    AlternatingStress === undefined || AlternatingStress === 0 ? undefined : Se / AlternatingStress;

  return Object.freeze({
    Se_prime,
    ka,
    kb,
    Se,
    NeuberConstant,
    Kf,
    BendingMoment,
    SectionModulus,
    AlternatingStress,
    SafetyFactor,
  });
}
