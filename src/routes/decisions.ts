import express from 'express';
import { format } from 'date-fns';
import { v4 as uuidv4 } from 'uuid';
import { BorderlineAdvisor } from '../engine/borderline_advisor';
import type { DecisionContext } from '../engine/decision_context';
import { resolveApplicationFields } from '../intake/field_resolution';
import { EvaluateRequest, ExplainRequest, evaluateRequestSchema, explainRequestSchema } from '../intake/request_schema';

/** CR-<year>-<5 hex>, e.g. CR-2025-3F9A1 */
export function createEvaluationId(now: Date = new Date()): string {
    return `CR-${format(now, 'yyyy')}-${uuidv4().slice(0, 5).toUpperCase()}`;
}

export function createDecisionRoutes(context: DecisionContext): express.Router {
    const router = express.Router();
    const advisor = new BorderlineAdvisor(context);

    router.post('/evaluate', (req, res, next) => {
        const parsed = evaluateRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            console.warn(`[Decisions] Rejected malformed evaluate request: ${parsed.error.issues.length} issue(s)`);
            return res.status(400).json({
                error: 'Malformed request body',
                details: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
            });
        }

        try {
            const { application, extracted, seed, explain }: EvaluateRequest = parsed.data;
            const resolution = resolveApplicationFields({ extracted, userSupplied: application });
            const result = advisor.evaluate(resolution.values, { seed, explain });

            res.json({
                evaluation_id: createEvaluationId(),
                ...result,
                field_sources: resolution.sources,
                unknown_fields: resolution.unknownFields,
                timestamp: new Date().toISOString()
            });
        } catch (error) {
            next(error);
        }
    });

    router.post('/explain', (req, res, next) => {
        const parsed = explainRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            console.warn(`[Decisions] Rejected malformed explain request: ${parsed.error.issues.length} issue(s)`);
            return res.status(400).json({
                error: 'Malformed request body',
                details: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
            });
        }

        try {
            const { application, extracted, seed, k }: ExplainRequest = parsed.data;
            const resolution = resolveApplicationFields({ extracted, userSupplied: application });
            const explanation = advisor.explainDecision(resolution.values, { seed, k });

            res.json({
                ...explanation,
                field_sources: resolution.sources,
                timestamp: new Date().toISOString()
            });
        } catch (error) {
            next(error);
        }
    });

    return router;
}
