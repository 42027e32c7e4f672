import React, { useState } from 'react';
import { useShaftFatigueViewModel } from '../viewmodels/useShaftFatigueViewModel';
import { FIELD_SPECS, GROUP_LABELS } from '../models/fields';
import { NOT_AVAILABLE, fatigueStrengthRows, formatValue, inputRows, stressAnalysisRows } from '../models/report';
import type { FieldGroup, ReportRow } from '../models/types';
import './Dashboard.css';

const GROUPS: FieldGroup[] = ['geometry', 'loads', 'material'];

// Charts are read by hand; values found there go back in through the form.
const REFERENCE_CHARTS = [
  { tab: 'Shaft Geometry', caption: 'Figure 1: Stepped shaft dimensions (Da, Db, r, L) and load positions (Lfa, Lfb)' },
  { tab: 'Kt Chart', caption: 'Figure 2: Theoretical stress concentration factor Kt for a stepped round bar in bending, by D/d and r/d' },
  { tab: 'Notch Sensitivity', caption: "Figure 3: Notch sensitivity and Neuber's constant against notch radius for steels" },
] as const;

// ── Helpers ────────────────────────────────────────────────────────────────
const ResultTable: React.FC<{ title: string; rows: ReportRow[] }> = ({ title, rows }) => (
  <div className="result-card">
    <h3>{title}</h3>
    <table className="result-table" aria-label={title}>
      <thead>
        <tr>
          <th>Parameter</th>
          <th>Value</th>
          <th>Units</th>
        </tr>
      </thead>
      <tbody>
        {rows.map((row) => (
          <tr key={row.parameter}>
            <td className="param-cell">{row.parameter}</td>
            <td className={`value-cell${row.value === NOT_AVAILABLE ? ' na' : ''}`}>{row.value}</td>
            <td className="unit-cell">{row.unit}</td>
          </tr>
        ))}
      </tbody>
    </table>
  </div>
);

const ReferenceCharts: React.FC = () => {
  const [active, setActive] = useState(0);
  const chart = REFERENCE_CHARTS[active] ?? REFERENCE_CHARTS[0];
  return (
    <div className="result-card">
      <h3>Reference Charts</h3>
      <div className="chart-tabs" role="tablist">
        {REFERENCE_CHARTS.map((c, i) => (
          <button
            key={c.tab}
            role="tab"
            aria-selected={i === active}
            className={`ratio-pip${i === active ? ' active' : ''}`}
            onClick={() => setActive(i)}
          >
            {c.tab}
          </button>
        ))}
      </div>
      <figure className="chart-placeholder" role="tabpanel">
        <div className="chart-frame">Chart image not bundled</div>
        <figcaption>{chart.caption}</figcaption>
      </figure>
    </div>
  );
};

// ── Main component ─────────────────────────────────────────────────────────
export const Dashboard: React.FC = () => {
  const {
    fields, updateField, resetDefaults,
    input, result, issues, safety,
    csv, downloadCsv, importCsv, error,
  } = useShaftFatigueViewModel();

  const issueFor = (key: string) => issues.find((i) => i.field === key)?.message;

  const handleCsvFile = async (e: React.ChangeEvent<HTMLInputElement>) => {
    const target = e.target;
    const file = target.files?.[0];
    if (!file) return;
    try {
      importCsv(await file.text());
    } catch (err) {
      console.error('Failed to read CSV file:', err);
    } finally {
      target.value = '';
    }
  };

  // ── Render ──────────────────────────────────────────────────────────────
  return (
    <div className="app-shell">
      <header className="app-header">
        <span className="app-title">Shaft Fatigue Lab</span>
        <span className="app-subtitle">Stepped shaft under bending · mm / N / MPa</span>
        <button className="btn-ghost" onClick={resetDefaults}>
          ↺ Reset Defaults
        </button>
      </header>

      <main className="app-main">
        {/* ─── Inputs ──────────────────────────────────────────────── */}
        <aside className="config-card">
          <h2 className="section-title">Input Parameters</h2>
          {GROUPS.map((group) => (
            <fieldset className="cfg-group" key={group}>
              <legend>{GROUP_LABELS[group]}</legend>
              {FIELD_SPECS.filter((spec) => spec.group === group).map((spec) => {
                const issue = issueFor(spec.key);
                const value = fields[spec.key];
                return (
                  <div className="cfg-field" key={spec.key}>
                    <label>{spec.label} ({spec.unit})
                      <input
                        type="number"
                        step={spec.step}
                        min={spec.min}
                        value={Number.isNaN(value) ? '' : value}
                        aria-invalid={issue ? true : undefined}
                        onChange={(e) => updateField(spec.key, parseFloat(e.target.value))}
                      />
                    </label>
                    {issue && <p className="field-issue">{issue}</p>}
                  </div>
                );
              })}
            </fieldset>
          ))}

          <div className="config-actions">
            <button className="btn-primary" onClick={downloadCsv} disabled={!csv}>
              Download Inputs (CSV)
            </button>
            <label className="btn-ghost file-btn">
              Load CSV
              <input
                type="file"
                accept=".csv,text/csv"
                hidden
                onChange={(e) => void handleCsvFile(e)}
              />
            </label>
          </div>

          {error && (
            <div className="error-box">
              <strong>Error:</strong> {error}
            </div>
          )}
        </aside>

        {/* ─── Results ─────────────────────────────────────────────── */}
        <section className="results-layout">
          {input && result ? (
            <>
              <div className="summary-row">
                <div className={`summary-chip primary ${safety.status}`}>
                  <span className="chip-label">Safety Factor (Modified Goodman)</span>
                  <span className="chip-value">
                    {result.SafetyFactor === undefined ? '—' : formatValue(result.SafetyFactor)}
                  </span>
                </div>
                <div className="summary-chip">
                  <span className="chip-label">Kt</span>
                  <span className="chip-value">{formatValue(input.Kt)}</span>
                </div>
              </div>
              <div className={`safety-banner ${safety.status}`} role="status">
                {safety.message}
              </div>

              <ResultTable title="Input Summary" rows={inputRows(input)} />
              <ResultTable title="Fatigue Strength Calculations" rows={fatigueStrengthRows(result)} />
              <ResultTable title="Stress Analysis" rows={stressAnalysisRows(input, result)} />
            </>
          ) : (
            <div className="result-card empty">
              <p className="card-hint">Fix the highlighted inputs to see results.</p>
            </div>
          )}
          <ReferenceCharts />
        </section>
      </main>
    </div>
  );
};
