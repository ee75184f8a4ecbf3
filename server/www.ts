/**
 * Web API routes and HTTP server configuration
 */

import Koa from 'koa';
import Router from '@koa/router';
import bodyParser from 'koa-bodyparser';
import send from 'koa-send';
import type { Server } from 'node:http';
import type { SimpleLogger } from './logger.js';
import type { Frame } from './frame-source.js';
import type { MonitorSnapshot } from './heartbeat.js';
import type { StandbyController, StandbyRequestResult } from './standby.js';
import type { SSEManager } from './sse-manager.js';
import type { SystemStatus } from './status.js';

// Statuses reported healthy to the container orchestrator
const HEALTHY: ReadonlySet<SystemStatus> = new Set<SystemStatus>(['ok', 'failure', 'starting', 'idle', 'standby']);

export interface WebServerDependencies {
    logger: SimpleLogger;
    standby: Pick<StandbyController, 'enabled' | 'enableStandby' | 'disableStandby' | 'getState'>;
    getSnapshot: () => MonitorSnapshot;
    getCurrentFrame: () => Frame | undefined;
    sse: Pick<SSEManager, 'addClient'>;
    /** Directory holding index.html */
    webRoot?: string;
}

/**
 * Map a standby request outcome onto an HTTP response
 */
export function standbyResponse(result: StandbyRequestResult, failureMessage: string): { status: number; body: object } {
    if (result.outcome === 'rejected' && result.reason === 'disabled') {
        return { status: 400, body: { error: 'Standby mode is disabled in configuration' } };
    }
    if (result.success) {
        return { status: 200, body: { success: true, standby_mode: result.mode === 'standby' } };
    }
    if (result.outcome === 'coalesced') {
        return {
            status: 409,
            body: {
                error: 'Another standby transition was in progress and did not reach the requested mode',
                mode: result.mode,
                ...(result.error && { last_error: result.error })
            }
        };
    }
    return {
        status: 500,
        body: {
            error: failureMessage,
            mode: result.mode,
            ...('error' in result && result.error && { last_error: result.error })
        }
    };
}

/**
 * Initialize and start the web server
 */
export async function initWeb(deps: WebServerDependencies, port: number = 8080): Promise<Server> {
    const { logger, standby, getSnapshot, getCurrentFrame, sse } = deps;
    const webRoot = deps.webRoot ?? (process.env['WEBPATH'] || './public');

    const api = new Router({ prefix: '/api' })
        .post('/standby/enable', async (ctx) => {
            if (!standby.enabled) {
                ctx.status = 400;
                ctx.body = { error: 'Standby mode is disabled in configuration' };
                return;
            }
            logger.info('Standby requested via API');
            const { status, body } = standbyResponse(await standby.enableStandby('manual'), 'Failed to enter standby mode');
            ctx.status = status;
            ctx.body = body;
        })
        .post('/standby/disable', async (ctx) => {
            if (!standby.enabled) {
                ctx.status = 400;
                ctx.body = { error: 'Standby mode is disabled in configuration' };
                return;
            }
            logger.info('Resume requested via API');
            const { status, body } = standbyResponse(await standby.disableStandby('manual'), 'Failed to exit standby mode');
            ctx.status = status;
            ctx.body = body;
        })
        .get('/standby/status', async (ctx) => {
            const state = standby.getState();
            ctx.body = {
                standby_mode: state.mode === 'standby',
                standby_enabled: state.enabled,
                auto_timeout: state.autoTimeoutMs / 1000,
                ml_container_running: state.containerRunning,
                mode: state.mode,
                last_error: state.lastError
            };
        })
        .get('/status', async (ctx) => {
            ctx.body = getSnapshot();
        })
        .get('/status/stream', async (ctx) => {
            sse.addClient(ctx, getSnapshot());
        });

    const assets = new Router()
        .get('/latest_frame.png', async (ctx) => {
            const frame = getCurrentFrame();
            if (!frame) {
                ctx.status = 404;
                ctx.body = { error: 'No frame available' };
                return;
            }
            ctx.set('Cache-Control', 'no-store');
            ctx.type = 'image/png';
            ctx.body = frame.data;
        })
        .get('/health', async (ctx) => {
            const snapshot = getSnapshot();
            if (HEALTHY.has(snapshot.status)) {
                ctx.body = { status: 'healthy' };
            } else {
                ctx.status = 503;
                ctx.body = { status: 'unhealthy', error: snapshot.last_error };
            }
        })
        .get('/', async (ctx) => {
            await send(ctx, 'index.html', { root: webRoot });
        });

    const app = new Koa();

    // Global error handler
    app.on('error', (err: Error & { code?: string }, ctx?: Koa.Context) => {
        if (err.code === 'ECONNRESET' ||
            err.code === 'EPIPE' ||
            err.code === 'ERR_STREAM_PREMATURE_CLOSE' ||
            err.message.includes('Premature close')) {
            logger.debug('Client disconnected', {
                path: ctx?.path,
                error: err.code || err.message
            });
            return;
        }

        logger.error('Application error', {
            error: err.message,
            stack: err.stack,
            path: ctx?.path,
            method: ctx?.method
        });
    });

    app.use(bodyParser());
    app.use(api.routes());
    app.use(api.allowedMethods());
    app.use(assets.routes());

    logger.info('Web server starting', { port });
    const server = app.listen(port);
    await new Promise<void>((resolve, reject) => {
        server.once('listening', () => resolve());
        server.once('error', reject);
    });

    return server;
}
