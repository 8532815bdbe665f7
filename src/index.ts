import dotenv from 'dotenv';
import { createApp } from './app.js';
import { ConfigError, loadConfig } from './config/env.js';
import type { AppConfig } from './config/env.js';
import { createFaceServices } from './services/index.js';

// Load environment variables
dotenv.config();

let config: AppConfig;
try {
    config = loadConfig();
} catch (error) {
    if (error instanceof ConfigError) {
        console.error('[CONFIG] Refusing to start:');
        for (const issue of error.issues) {
            console.error(`[CONFIG]   ${issue}`);
        }
        process.exit(1);
    }
    throw error;
}

const services = createFaceServices(config);
const app = createApp(config, services);

const server = app.listen(config.port, () => {
    console.log(`🚀 Server running on http://localhost:${config.port}/api`);
    console.log(`🧑 Face provider: ${services.providerName}`);
    console.log(`🔁 CompreFace route: ${services.compreFaceComparison ? 'ENABLED' : 'DISABLED'}`);
    console.log(`💾 Crop storage: ${config.persistCrops ? config.outputDir : 'DISABLED'}`);
});

// Graceful shutdown
process.on('SIGTERM', () => {
    console.log('SIGTERM received, shutting down...');
    server.close(() => process.exit(0));
});
