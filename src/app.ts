import express from 'express';
import cors from 'cors';
import type { AppConfig } from './config/env.js';
import { errorHandler } from './middleware/error.middleware.js';
import { createFaceRouter } from './routes/face.routes.js';
import type { FaceServices } from './services/index.js';

/**
 * Build the Express app. Services are injected so tests can run the
 * full HTTP surface against an in-memory provider.
 */
export function createApp(config: AppConfig, services: FaceServices): express.Express {
    const app = express();

    // Empty list allows any origin
    app.use(cors({
        origin: (origin, callback) => {
            if (!origin || config.corsOrigins.length === 0 || config.corsOrigins.includes(origin)) {
                callback(null, origin || true);
            } else {
                console.log(`[CORS] Blocked origin: ${origin}`);
                callback(null, false);
            }
        },
    }));

    // Liveness probe, no key required
    app.get('/api/ping', (req, res) => {
        res.type('text/plain').send('Face extraction service running');
    });

    app.use('/api', createFaceRouter(services, {
        functionKey: config.functionKey,
        maxUploadBytes: config.maxUploadBytes,
    }));

    // Error handling
    app.use(errorHandler);

    return app;
}
