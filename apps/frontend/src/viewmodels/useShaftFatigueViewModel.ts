import { useState, useEffect, useMemo, useCallback } from 'react';
import { buildInput } from '../models/inputAggregator';
import { calculate } from '../models/fatigueCalculator';
import { INPUT_CSV_FILENAME, INPUT_CSV_MIME, exportInputCsv, parseInputCsv } from '../models/inputCsv';
import { assessSafety } from '../models/report';
import { DomainError, InvalidInputError, ShaftCalcError } from '../models/errors';
import { defaultInputFields, rawInputFields } from '../models/fields';
import type { FieldIssue, InputFields, InputKey, InputRecord, ResultRecord } from '../models/types';

interface Evaluation {
  input: InputRecord | null;
  result: ResultRecord | null;
  issues: FieldIssue[];
}

function evaluate(fields: InputFields): Evaluation {
  try {
    const input = buildInput(fields);
    return { input, result: calculate(input), issues: [] };
  } catch (err) {
    if (err instanceof InvalidInputError) return { input: null, result: null, issues: err.issues };
    if (err instanceof DomainError) {
      return { input: null, result: null, issues: [{ field: 'rd_ratio', message: err.message }] };
    }
    throw err;
  }
}

export const useShaftFatigueViewModel = () => {
  const [fields, setFields] = useState<InputFields>(defaultInputFields);
  const [error, setError] = useState<string | null>(null);

  // Recomputed in full on every edit; there is nothing to cancel.
  const { input, result, issues } = useMemo(() => evaluate(fields), [fields]);
  const safety = useMemo(() => assessSafety(result?.SafetyFactor), [result]);
  const csv = useMemo(() => (input ? exportInputCsv(input) : null), [input]);

  useEffect(() => {
    if (issues.length > 0) {
      console.warn('Shaft inputs invalid:', issues.map((i) => i.field).join(', '));
    }
  }, [issues]);

  const updateField = useCallback((key: InputKey, value: number) => {
    setFields((prev) => ({ ...prev, [key]: value }));
    setError(null);
  }, []);

  const resetDefaults = useCallback(() => {
    setFields(defaultInputFields());
    setError(null);
  }, []);

  const downloadCsv = useCallback(() => {
    if (!csv) return;
    try {
      const blob = new Blob([csv], { type: INPUT_CSV_MIME });
      const url = URL.createObjectURL(blob);
      const a = document.createElement('a');
      a.href = url;
      a.download = INPUT_CSV_FILENAME;
      document.body.appendChild(a);
      a.click();
      document.body.removeChild(a);
      URL.revokeObjectURL(url);
    } catch (err) {
      console.error('Failed to export CSV:', err);
      setError(err instanceof Error ? err.message : 'CSV export failed.');
    }
  }, [csv]);

  const importCsv = useCallback((text: string) => {
    try {
      setFields(rawInputFields(parseInputCsv(text)));
      setError(null);
    } catch (err) {
      if (!(err instanceof ShaftCalcError)) throw err;
      console.warn('Rejected CSV import:', err.message);
      setError(`Could not import CSV: ${err.message}`);
    }
  }, []);

  return {
    fields,
    updateField,
    resetDefaults,
    input,
    result,
    issues,
    safety,
    csv,
    downloadCsv,
    importCsv,
    error,
  };
};
