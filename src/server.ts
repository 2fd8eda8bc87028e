import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';
import { env } from './config/env';
import { engineConfigFromEnv } from './config/engine_config';
import { DecisionContext, createDecisionContext } from './engine/decision_context';
import { ValidationError } from './engine/errors';
import { isRecord } from './utils/freeze';

// Route Factories
import { createDecisionRoutes } from './routes/decisions';
import { createKnowledgeRoutes } from './routes/knowledge';

/** 4xx status carried by body-parser and http-errors style errors. */
function clientErrorStatus(err: unknown): number | undefined {
    if (!isRecord(err)) return undefined;
    const status = typeof err.status === 'number' ? err.status : err.statusCode;
    return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function createApp(context: DecisionContext): express.Express {
    const app = express();

    app.set('trust proxy', 1);

    const limiter = rateLimit({
        windowMs: 15 * 60 * 1000, // 15 minutes
        limit: 300,
        standardHeaders: 'draft-7',
        legacyHeaders: false
    });

    // Middleware
    app.use(helmet());
    app.use(express.json({ limit: '1mb' }));
    app.use(morgan(env.NODE_ENV === 'production' ? 'combined' : 'dev'));

    // CORS allow-list: comma-separated origins, or * for any
    const allowedOrigins = env.CORS_ORIGIN.split(',').map(o => o.trim()).filter(o => o.length > 0);

    app.use(cors({
        origin: (origin, callback) => {
            // No origin: curl, server-to-server
            if (!origin || allowedOrigins.includes('*') || allowedOrigins.includes(origin)) {
                callback(null, true);
            } else {
                console.warn(`[Server] Blocked CORS origin: ${origin}`);
                callback(new Error('Not allowed by CORS'));
            }
        }
    }));

    app.use(limiter);

    // Health Check
    app.get('/health', (req, res) => {
        res.json({
            status: 'ok',
            env: env.NODE_ENV,
            model_version: context.classifier.modelVersion,
            knowledge_base_version: context.knowledgeBase.version,
            timestamp: new Date().toISOString()
        });
    });

    // Routes
    app.use('/api/decisions', createDecisionRoutes(context));
    app.use('/api/knowledge', createKnowledgeRoutes(context));

    // Error Handling
    app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
        if (res.headersSent) return next(err);
        if (err instanceof ValidationError) {
            console.warn(`[Server] ${err.message}`);
            return res.status(400).json({ error: err.message, fields: err.fields, issues: err.issues });
        }
        const status = clientErrorStatus(err);
        if (status !== undefined) {
            console.warn(`[Server] Rejected request (${status}): ${err instanceof Error ? err.message : String(err)}`);
            return res.status(status).json({ error: status === 413 ? 'Request body too large' : 'Malformed request body' });
        }
        console.error(err instanceof Error ? err.stack : err);
        res.status(500).json({ error: 'Internal Server Error' });
    });

    return app;
}

if (require.main === module) {
    // Artifacts and tuning are checked once, here; a bad deployment fails to start.
    const context = createDecisionContext({
        config: engineConfigFromEnv(env),
        modelPath: env.MODEL_PATH,
        knowledgeBasePath: env.KNOWLEDGE_BASE_PATH
    });

    if (env.NODE_ENV === 'production' && env.CORS_ORIGIN === '*') {
        console.warn('WARNING: CORS_ORIGIN allows every origin in production.');
    }

    const PORT = Number(env.PORT);
    createApp(context).listen(PORT, () => {
        console.log(`Credit Decision Engine running on port ${PORT}`);
        console.log(`Environment: ${env.NODE_ENV}`);
        console.log(`CORS Policy: ${env.CORS_ORIGIN}`);
    });
}
