import express from 'express';
import { FIELD_SPECS, isFeatureId } from '../engine/feature_schema';
import type { DecisionContext } from '../engine/decision_context';

export function createKnowledgeRoutes(context: DecisionContext): express.Router {
    const router = express.Router();
    const { knowledgeBase } = context;

    router.get('/features', (req, res) => {
        res.json({
            version: knowledgeBase.version,
            features: knowledgeBase.entries().map(rule => ({
                label: FIELD_SPECS[rule.feature_id].label,
                kind: FIELD_SPECS[rule.feature_id].kind,
                ...rule
            }))
        });
    });

    router.get('/features/:featureId', (req, res) => {
        const { featureId } = req.params;
        const rule = knowledgeBase.lookup(featureId);
        if (!isFeatureId(featureId) || !rule) {
            return res.status(404).json({ error: `No knowledge rule for ${featureId}` });
        }
        res.json({ label: FIELD_SPECS[featureId].label, kind: FIELD_SPECS[featureId].kind, ...rule });
    });

    return router;
}
