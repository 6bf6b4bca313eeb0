// src/routes/compliance.ts
// Compliance API routes
//
// Endpoints:
// - GET  /compliance/checklist            : Built-in checklist and fact vocabulary
// - POST /compliance/checklists/validate  : Compile an uploaded (parsed) checklist
// - POST /compliance/evaluate             : Evaluate extracted facts against a checklist

import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import { config } from '../config';
import {
  BUILTIN_CHECKLIST,
  BUILTIN_FACT_KEYS,
  compileCustomChecklist,
  evaluateCompliance,
  InvalidChecklistError,
  toChecklistRows,
  type CompiledChecklist,
  type ComplianceReport,
} from '../compliance';
import { isRecord } from '../compliance/normalize';
import { recordEvaluation } from '../observability/metrics';
import { getRequestLogger } from '../observability/requestLogger';

/* ---------- Types ---------- */

interface ValidateBody {
  name?: unknown;
  rules?: unknown;
}

interface EvaluateBody {
  facts?: unknown;
  /** Raw rule list, or the parser's `{ name, rules }` wrapper */
  rules?: unknown;
  siteUrl?: unknown;
}

/* ---------- Helpers ---------- */

/** Accept a bare rule list or a `{ rules: [...] }` wrapper; null otherwise */
function unwrapRules(value: unknown): unknown[] | null {
  if (Array.isArray(value)) return value;
  if (isRecord(value) && Array.isArray(value.rules)) return value.rules;
  return null;
}

function sendInvalidChecklist(reply: FastifyReply, err: InvalidChecklistError) {
  return reply.code(err.statusCode).send({
    error: 'invalid_checklist',
    message: err.message,
    issues: err.issues,
  });
}

function sendTooManyRules(reply: FastifyReply, count: number) {
  return reply.code(400).send({
    error: 'too_many_rules',
    message: `Checklist has ${count} rules; at most ${config.checklists.maxCustomRules} are accepted`,
  });
}

function describeChecklist(checklist: CompiledChecklist) {
  return {
    source: checklist.source,
    sections: checklist.sections,
    rules: checklist.rules,
    warnings: checklist.warnings,
  };
}

/* ---------- Routes ---------- */

export const complianceRoutes: FastifyPluginAsync = async (fastify) => {
  /**
   * GET /compliance/checklist
   * The built-in checklist plus the Fact Store keys it reads.
   */
  fastify.get('/compliance/checklist', async () => ({
    ...describeChecklist(BUILTIN_CHECKLIST),
    factKeys: BUILTIN_FACT_KEYS,
  }));

  /**
   * POST /compliance/checklists/validate
   * Compile rules produced by the checklist parser and report downgrades.
   * An empty rule list is rejected, never replaced by the built-in checklist.
   */
  fastify.post<{ Body: ValidateBody }>('/compliance/checklists/validate', async (req, reply) => {
    const { name, rules } = req.body ?? {};

    if (!Array.isArray(rules)) {
      return reply.code(400).send({
        error: 'rules_required',
        message: 'A rules list is required',
      });
    }
    if (rules.length > config.checklists.maxCustomRules) {
      return sendTooManyRules(reply, rules.length);
    }

    try {
      const checklist = compileCustomChecklist(rules);
      return reply.send({
        name: typeof name === 'string' && name.trim() ? name.trim() : null,
        ...describeChecklist(checklist),
      });
    } catch (err) {
      if (err instanceof InvalidChecklistError) return sendInvalidChecklist(reply, err);
      throw err;
    }
  });

  /**
   * POST /compliance/evaluate
   * Evaluate a Fact Store against the built-in checklist, or against `rules`
   * when given. Responds with the report and its flat checklist rows.
   */
  fastify.post<{ Body: EvaluateBody }>('/compliance/evaluate', async (req, reply) => {
    const { facts, rules, siteUrl } = req.body ?? {};
    const log = getRequestLogger(req);

    if (!isRecord(facts)) {
      return reply.code(400).send({
        error: 'facts_required',
        message: 'An object of extracted facts is required',
      });
    }

    let checklist: CompiledChecklist | undefined;
    if (rules !== undefined && rules !== null) {
      const rawRules = unwrapRules(rules);
      if (!rawRules) {
        return reply.code(400).send({
          error: 'rules_invalid',
          message: 'rules must be a list or an object with a rules list',
        });
      }
      if (rawRules.length > config.checklists.maxCustomRules) {
        return sendTooManyRules(reply, rawRules.length);
      }
      try {
        checklist = compileCustomChecklist(rawRules);
      } catch (err) {
        if (err instanceof InvalidChecklistError) return sendInvalidChecklist(reply, err);
        throw err;
      }
    }

    const startedAt = Date.now();
    let report: ComplianceReport;
    try {
      report = evaluateCompliance({ facts, checklist });
    } catch (err) {
      log.error({ err }, 'compliance evaluation failed');
      return reply.code(500).send({
        error: 'compliance_evaluation_failed',
        message: `Compliance evaluation failed: ${err instanceof Error ? err.message : String(err)}`,
      });
    }

    recordEvaluation(report.status, report.checklistSource, Date.now() - startedAt);
    log.info(
      {
        reportId: report.reportId,
        siteUrl: typeof siteUrl === 'string' ? siteUrl : undefined,
        overallScore: report.overallScore,
        status: report.status,
      },
      'compliance evaluation complete'
    );

    return reply.send({
      report,
      checklist: toChecklistRows(report),
    });
  });
};
