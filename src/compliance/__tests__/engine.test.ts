import { describe, it, expect } from 'vitest';
import { evaluateCompliance } from '../engine.js';
import { compileCustomChecklist } from '../compiler.js';
import { FULL_COMPLIANCE_SUMMARY } from '../aggregate.js';
import { InvalidChecklistError } from '../errors.js';
import type { ComplianceReport, Verdict } from '../types.js';
import compliantFacts from './fixtures/compliantFacts.json';

/* ============= Helpers ============= */

const fixedNow = () => new Date('2024-05-01T12:00:00.000Z');

function allVerdicts(report: ComplianceReport): Verdict[] {
  return report.sections.flatMap((section) => [...section.items]);
}

function statusOf(report: ComplianceReport, ruleId: string) {
  return allVerdicts(report).find((verdict) => verdict.ruleId === ruleId)?.status;
}

/* ============= Built-in Checklist ============= */

describe('evaluateCompliance with the built-in checklist', () => {
  it('scores a fully compliant site at 100', () => {
    const report = evaluateCompliance({ facts: compliantFacts, now: fixedNow });

    expect(report.overallScore).toBe(100);
    expect(report.status).toBe('COMPLIANT');
    expect(report.summary).toBe(FULL_COMPLIANCE_SUMMARY);
    expect(report.checklistSource).toBe('builtin');
    expect(report.generatedAt).toBe('2024-05-01T12:00:00.000Z');
    expect(report.reportId).toMatch(/^rpt_[0-9a-f]{16}$/);

    const manual = allVerdicts(report).filter((v) => v.status === 'manual_review');
    expect(manual.map((v) => v.ruleId)).toEqual(['RCP-001', 'RCP-002', 'UPD-001']);
    expect(allVerdicts(report).filter((v) => v.status === 'pass')).toHaveLength(31);
  });

  it('rates an empty Fact Store NON_COMPLIANT', () => {
    const report = evaluateCompliance({ facts: {}, now: fixedNow });

    expect(report.overallScore).toBe(13);
    expect(report.status).toBe('NON_COMPLIANT');
    expect(report.summary.startsWith('Compliance gaps found in: 8. Mobile Compliance (0%)')).toBe(true);

    expect(statusOf(report, 'CMP-001')).toBe('fail');
    expect(statusOf(report, 'CNT-001')).toBe('fail');
    expect(statusOf(report, 'CNT-002')).toBe('warning');
    expect(statusOf(report, 'RCP-001')).toBe('manual_review');
    expect(allVerdicts(report).every((v) => v.foundValue === null)).toBe(true);
  });

  it('keeps every section in checklist order with one verdict per rule', () => {
    const report = evaluateCompliance({ facts: {} });
    expect(report.sections.map((s) => s.sectionName)).toEqual([
      '1. Company Information',
      '2. Contacts',
      '3. Policies',
      '4. Product/Service Description',
      '5. Checkout',
      '6. Receipt Information',
      '7. Update Notifications',
      '8. Mobile Compliance',
    ]);
    expect(allVerdicts(report)).toHaveLength(34);
  });

  it('treats the Not found sentinel like a missing fact', () => {
    const facts = { ...compliantFacts, company_name: 'Not found' };
    const report = evaluateCompliance({ facts });
    expect(statusOf(report, 'CMP-001')).toBe('fail');
    expect(report.overallScore).toBeLessThan(100);
  });

  it('does not let a failing info rule block COMPLIANT', () => {
    const facts = { ...compliantFacts, has_license_info: false };
    const report = evaluateCompliance({ facts });
    expect(statusOf(report, 'CMP-006')).toBe('warning');
    expect(report.status).toBe('COMPLIANT');
  });

  it('never raises the score when a fact is removed', () => {
    const full = evaluateCompliance({ facts: compliantFacts });
    for (const key of Object.keys(compliantFacts)) {
      const facts: Record<string, unknown> = { ...compliantFacts };
      delete facts[key];
      const report = evaluateCompliance({ facts });
      expect(report.overallScore).toBeLessThanOrEqual(full.overallScore);
      expect(report.overallScore).toBeGreaterThanOrEqual(0);
    }
  });
});

/* ============= Determinism ============= */

describe('evaluateCompliance determinism', () => {
  it('returns the same report id and content for the same input', () => {
    const first = evaluateCompliance({ facts: compliantFacts, now: fixedNow });
    const second = evaluateCompliance({
      facts: compliantFacts,
      now: () => new Date('2025-01-01T00:00:00.000Z'),
    });
    expect(second.reportId).toBe(first.reportId);
    expect({ ...second, generatedAt: first.generatedAt }).toEqual(first);
  });

  it('changes the report id when the outcome changes', () => {
    const compliant = evaluateCompliance({ facts: compliantFacts });
    const empty = evaluateCompliance({ facts: {} });
    expect(empty.reportId).not.toBe(compliant.reportId);
  });

  it('returns a frozen report', () => {
    const report = evaluateCompliance({ facts: {} });
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.sections)).toBe(true);
    expect(Object.isFrozen(report.sections[0].items[0])).toBe(true);
  });

  it('does not mutate the facts', () => {
    const facts = { ...compliantFacts };
    evaluateCompliance({ facts });
    expect(facts).toEqual(compliantFacts);
  });
});

/* ============= Custom Checklists ============= */

describe('evaluateCompliance with custom rules', () => {
  it('passes an https rule against a matching site URL', () => {
    const report = evaluateCompliance({
      facts: { site_url: 'https://example.com' },
      rules: [
        {
          rule_id: 'SEC-01',
          section: 'Security',
          pass_condition: { kind: 'matches', value: '^https://' },
          extraction_key: 'site_url',
        },
      ],
    });
    expect(report.checklistSource).toBe('custom');
    expect(statusOf(report, 'SEC-01')).toBe('pass');
    expect(report.overallScore).toBe(100);
  });

  it('evaluates a downgraded rule as not_empty', () => {
    const rules = [{ rule_id: 'X-01', section: 'Misc', pass_condition: 'fuzzy_llm_check', extraction_key: 'x' }];
    const report = evaluateCompliance({ facts: { x: 'anything' }, rules });
    expect(statusOf(report, 'X-01')).toBe('pass');
    expect(report.warnings).toEqual([
      'X-01: unrecognized pass condition kind "fuzzy_llm_check"; evaluated as not_empty',
    ]);
  });

  it('scores weighted sections independently', () => {
    const rules = [
      { rule_id: 'A-1', section: 'A', section_weight: 60, extraction_key: 'a1', pass_condition: 'true' },
      { rule_id: 'A-2', section: 'A', section_weight: 60, extraction_key: 'a2', pass_condition: 'true' },
      { rule_id: 'B-1', section: 'B', section_weight: 40, extraction_key: 'b1', pass_condition: 'true' },
    ];
    const report = evaluateCompliance({ facts: { a1: true, a2: false, b1: 'yes' }, rules });

    expect(report.sections.map((s) => [s.sectionName, s.sectionScore])).toEqual([
      ['A', 30],
      ['B', 40],
    ]);
    expect(report.overallScore).toBe(70);
    expect(report.status).toBe('NEEDS_REVIEW');
    expect(report.summary).toBe('Compliance gaps found in: A (50%).');
  });

  it('reports COMPLIANT below 80 when only info rules fail', () => {
    const rules = [
      { rule_id: 'R1', section: 'S', extraction_key: 'r1' },
      { rule_id: 'R2', section: 'S', extraction_key: 'r2', severity: 'info' },
    ];
    const report = evaluateCompliance({ facts: { r1: 'present' }, rules });
    expect(report.overallScore).toBe(75);
    expect(report.status).toBe('COMPLIANT');
  });

  it('keeps scores finite for oversized rule weights', () => {
    const rules = [
      { rule_id: 'A', section: 'S', extraction_key: 'a', weight: 1e308 },
      { rule_id: 'B', section: 'S', extraction_key: 'b', weight: '1e308' },
    ];
    const report = evaluateCompliance({ facts: { a: 'x', b: 'y' }, rules });
    expect(report.sections[0].sectionScore).toBe(100);
    expect(report.overallScore).toBe(100);
    expect(report.status).toBe('COMPLIANT');
  });

  it('shares the score equally when section weights are oversized', () => {
    const rules = [
      { rule_id: 'A', section: 'First', extraction_key: 'a', section_weight: 1e308 },
      { rule_id: 'B', section: 'Second', extraction_key: 'b', section_weight: 1e308 },
    ];
    const report = evaluateCompliance({ facts: { a: 'x', b: 'y' }, rules });
    expect(report.sections.map((s) => s.sectionWeight)).toEqual([50, 50]);
    expect(report.overallScore).toBe(100);
    expect(report.status).toBe('COMPLIANT');
  });

  it('prefers a precompiled checklist over raw rules', () => {
    const checklist = compileCustomChecklist([{ rule_id: 'P-1', section: 'S', extraction_key: 'p' }]);
    const report = evaluateCompliance({
      facts: { p: 'x' },
      rules: [{ rule_id: 'IGNORED', section: 'S' }],
      checklist,
    });
    expect(allVerdicts(report).map((v) => v.ruleId)).toEqual(['P-1']);
  });

  it('falls back to the built-in checklist for an empty rule list', () => {
    const report = evaluateCompliance({ facts: {}, rules: [] });
    expect(report.checklistSource).toBe('builtin');
  });

  it('propagates structural checklist errors', () => {
    expect(() => evaluateCompliance({ facts: {}, rules: [{ rule_id: 'A' }] })).toThrow(InvalidChecklistError);
  });
});
