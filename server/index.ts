/**
 * Main entry point for the print monitor
 *
 * Loads configuration, builds the service (service.ts) and registers
 * graceful shutdown handling.
 */

import { createLogger, logger as bootLogger } from './logger.js';
import { loadConfig, logConfig, type MonitorConfig } from './config.js';
import { createService } from './service.js';
import { setLogger } from './process-utils.js';
import { setLogger as setSSELogger } from './sse-manager.js';
import { errorMessage } from './errors.js';

let config: MonitorConfig;
try {
    config = loadConfig();
} catch (e) {
    bootLogger.error('Failed to load configuration', { error: errorMessage(e) });
    process.exit(1);
}

const logger = createLogger(config.log);

setLogger(logger);
setSSELogger(logger);

const service = createService(config, logger);

// ============================================================================
// Graceful Shutdown
// ============================================================================

let shuttingDown = false;

async function gracefulShutdown(signal: string, exitCode = 0): Promise<void> {
    if (shuttingDown) {
        logger.warn('Shutdown already in progress');
        return;
    }
    shuttingDown = true;
    logger.info('Graceful shutdown initiated', { signal });

    try {
        await service.shutdown();
    } catch (e) {
        logger.error('Error during shutdown', { error: errorMessage(e) });
        exitCode = exitCode || 1;
    }

    logger.info('Shutdown complete', { signal });
    process.exit(exitCode);
}

// ============================================================================
// Main Application Entry
// ============================================================================

async function main(): Promise<void> {
    logConfig(config, logger);

    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

    process.on('uncaughtException', (error) => {
        logger.error('Uncaught exception - initiating shutdown', {
            error: error.message,
            stack: error.stack
        });
        void gracefulShutdown('uncaughtException', 1);
    });

    process.on('unhandledRejection', (reason) => {
        logger.error('Unhandled rejection - initiating shutdown', {
            reason: reason instanceof Error ? reason.message : String(reason),
            stack: reason instanceof Error ? reason.stack : undefined
        });
        void gracefulShutdown('unhandledRejection', 1);
    });

    await service.start();
}

main().catch((e: unknown) => {
    logger.error('Failed to start application', { error: errorMessage(e) });
    process.exit(1);
});
