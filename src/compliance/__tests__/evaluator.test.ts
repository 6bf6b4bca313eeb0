import { describe, it, expect } from 'vitest';
import { evaluateRule, evaluateRules } from '../evaluator.js';
import { compileCustomChecklist } from '../compiler.js';
import type { FactStore, Rule } from '../types.js';

/* ============= Helpers ============= */

function makeRule(overrides: Partial<Rule>): Rule {
  return {
    ruleId: 'CMP-004',
    section: '1. Company Information',
    item: 'VAT number',
    description: 'Show the VAT number.',
    extractionKey: 'vat_number',
    passCondition: { kind: 'not_empty' },
    severity: 'fail',
    weight: 1,
    downgradeNote: null,
    ...overrides,
  };
}

/* ============= Tests ============= */

describe('evaluateRule', () => {
  it('passes with the found value and no recommendation', () => {
    const verdict = evaluateRule(makeRule({}), { vat_number: 'DE123456789' });
    expect(verdict).toEqual({
      ruleId: 'CMP-004',
      item: 'VAT number',
      severity: 'fail',
      status: 'pass',
      foundValue: 'DE123456789',
      recommendation: null,
    });
  });

  it('fails a fail-severity rule when the key is missing', () => {
    const verdict = evaluateRule(makeRule({}), {});
    expect(verdict.status).toBe('fail');
    expect(verdict.foundValue).toBeNull();
    expect(verdict.recommendation).toBe('Add or correct "VAT number" on the site. Show the VAT number.');
  });

  it('fails not_empty rules on the Not found sentinel in any casing', () => {
    for (const value of ['Not found', 'not found', 'NOT FOUND', ' Not Found ']) {
      const verdict = evaluateRule(makeRule({}), { vat_number: value });
      expect(verdict.status).toBe('fail');
      expect(verdict.foundValue).toBeNull();
    }
  });

  it('maps warning severity to a warning verdict', () => {
    const rule = makeRule({
      ruleId: 'CNT-002',
      item: 'Phone number',
      description: 'Provide a phone number.',
      extractionKey: 'phone_number',
      severity: 'warning',
    });
    const verdict = evaluateRule(rule, {});
    expect(verdict.status).toBe('warning');
    expect(verdict.recommendation).toBe(
      'Review "Phone number": it could not be confirmed on the site. Provide a phone number.'
    );
  });

  it('maps info severity to a warning verdict', () => {
    const verdict = evaluateRule(makeRule({ severity: 'info' }), { vat_number: '' });
    expect(verdict.status).toBe('warning');
    expect(verdict.severity).toBe('info');
  });

  it('returns manual_review for manual rules whatever the facts hold', () => {
    const rule = makeRule({
      ruleId: 'RCP-001',
      item: 'Electronic receipt sent',
      description: '',
      extractionKey: 'has_receipt_info',
      passCondition: { kind: 'manual' },
    });
    const stores: FactStore[] = [{}, { has_receipt_info: true }, { has_receipt_info: 'Not found' }];
    for (const facts of stores) {
      expect(evaluateRule(rule, facts).status).toBe('manual_review');
    }

    const verdict = evaluateRule(rule, { has_receipt_info: true });
    expect(verdict.foundValue).toBe('true');
    expect(verdict.recommendation).toBe(
      'Verify "Electronic receipt sent" manually: human verification is required because this check cannot be automated.'
    );
  });

  it('falls back to the rule id when the item label is blank', () => {
    const verdict = evaluateRule(makeRule({ item: '  ', description: '' }), {});
    expect(verdict.recommendation).toBe('Add or correct "CMP-004" on the site.');
  });

  it('coerces non-string facts before regex and length checks', () => {
    const regexRule = makeRule({ passCondition: { kind: 'matches', pattern: 'Mastercard', flags: '' } });
    expect(evaluateRule(regexRule, { vat_number: ['Visa', 'Mastercard'] }).foundValue).toBe('Visa, Mastercard');
    expect(evaluateRule(regexRule, { vat_number: ['Visa', 'Mastercard'] }).status).toBe('pass');

    const lengthRule = makeRule({ passCondition: { kind: 'min_length', length: 5 } });
    expect(evaluateRule(lengthRule, { vat_number: false }).status).toBe('pass');
    expect(evaluateRule(lengthRule, { vat_number: true }).status).toBe('fail');
  });

  it('reads nested facts through a dotted extraction key', () => {
    const rule = makeRule({ extractionKey: 'company.vat' });
    expect(evaluateRule(rule, { company: { vat: 'DE1' } }).status).toBe('pass');
  });

  it('freezes the verdict', () => {
    expect(Object.isFrozen(evaluateRule(makeRule({}), {}))).toBe(true);
  });

  it('passes a custom https rule against a matching site URL', () => {
    const checklist = compileCustomChecklist([
      {
        rule_id: 'SEC-01',
        section: 'Security',
        pass_condition: { kind: 'matches', value: '^https://' },
        extraction_key: 'site_url',
      },
    ]);
    const verdict = evaluateRule(checklist.rules[0], { site_url: 'https://example.com' });
    expect(verdict.status).toBe('pass');
    expect(verdict.foundValue).toBe('https://example.com');
  });
});

describe('evaluateRules', () => {
  it('produces one verdict per rule in rule order', () => {
    const rules = [
      makeRule({ ruleId: 'A' }),
      makeRule({ ruleId: 'B', passCondition: { kind: 'manual' } }),
      makeRule({ ruleId: 'C' }),
    ];
    const verdicts = evaluateRules(rules, { vat_number: 'DE1' });
    expect(verdicts.map((v) => [v.ruleId, v.status])).toEqual([
      ['A', 'pass'],
      ['B', 'manual_review'],
      ['C', 'pass'],
    ]);
  });
});
