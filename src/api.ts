// ========================================
// Docker Command Gateway - HTTP API Server
// ========================================

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import type { Settings } from './config.js';
import { errorMessage } from './errors.js';
import type { GatewayService } from './gateway-service.js';
import { gatewayRequestBody } from './schemas.js';

export const SERVICE_NAME = 'docker-command-gateway';
export const SERVICE_VERSION = '1.0.0';

export interface ApiDeps {
    service: Pick<GatewayService, 'processRequest'>;
    settings: Settings;
}

function healthChecks(settings: Settings): Record<string, string | number | boolean> {
    const checks: Record<string, string | number | boolean> = {
        configuration: 'ok',
        gateway_id: settings.instanceId,
        execution_strategy: settings.execution.strategy,
        container_mappings: Object.keys(settings.services).length,
    };
    if (settings.execution.strategy === 'remote') {
        checks.ssh_host = settings.execution.ssh.host;
        checks.ssh_user = settings.execution.ssh.user;
        checks.ssh_key_configured = Boolean(settings.execution.ssh.privateKeyPath);
    }
    return checks;
}

export function createApp({ service, settings }: ApiDeps): Express {
    const app = express();

    // Middleware
    const origins = settings.corsOrigins;
    app.use(cors({ origin: origins.includes('*') ? '*' : origins, methods: ['GET', 'POST'] }));
    app.use(express.json({ limit: '1mb' }));

    // Request logging (skip health checks)
    app.use((req, _res, next) => {
        if (req.path !== '/health') {
            console.log(`[HTTP] ${new Date().toISOString()} ${req.method} ${req.path}`);
        }
        next();
    });

    // ========================================
    // Health Check
    // ========================================
    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            status: 'healthy',
            service: SERVICE_NAME,
            version: SERVICE_VERSION,
            timestamp: new Date().toISOString(),
            checks: healthChecks(settings),
        });
    });

    // ========================================
    // Execute Docker Command
    // POST /execute-docker-command
    // Body: { source_id, target_resource: { name }, action_request: { intent, context?, priority? } }
    // ========================================
    app.post('/execute-docker-command', async (req: Request, res: Response, next: NextFunction) => {
        try {
            if (settings.apiKey !== null && req.header('x-gateway-key') !== settings.apiKey) {
                console.log(`[HTTP] Blocked unauthorized request from ${req.ip}`);
                res.status(403).json({ error: 'Forbidden: API key required' });
                return;
            }

            const parsed = gatewayRequestBody.safeParse(req.body);
            if (!parsed.success) {
                res.status(400).json({
                    error: 'Invalid request body',
                    details: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
                });
                return;
            }

            const response = await service.processRequest(parsed.data);
            res.json(response);
        } catch (err) {
            next(err);
        }
    });

    // ========================================
    // Root Endpoint
    // ========================================
    app.get('/', (_req: Request, res: Response) => {
        res.json({
            service: SERVICE_NAME,
            version: SERVICE_VERSION,
            endpoints: {
                health: 'GET /health',
                execute: 'POST /execute-docker-command',
            },
        });
    });

    // Malformed JSON bodies surface here as body-parser errors with a status.
    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        const status = typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number' ? err.status : 500;
        if (status >= 500) {
            console.error(`[FAIL] Unhandled API error:`, errorMessage(err));
            res.status(500).json({ error: 'Internal server error', detail: errorMessage(err) });
            return;
        }
        res.status(status).json({ error: 'Invalid request body', detail: errorMessage(err) });
    });

    return app;
}

// ========================================
// Start Server
// ========================================
export function startServer(app: Express, settings: Settings): Promise<Server> {
    return new Promise<Server>((resolve, reject) => {
        const server = app.listen(settings.apiPort, settings.apiHost, () => {
            console.log();
            console.log(`[HTTP] Docker Command Gateway v${SERVICE_VERSION} (${settings.instanceId})`);
            console.log(`[HTTP] Server: http://${settings.apiHost}:${settings.apiPort}`);
            console.log(`[HTTP] Strategy: ${settings.execution.strategy}`);
            console.log('[HTTP] Endpoints:');
            console.log('   GET  /health                  - Health check');
            console.log('   POST /execute-docker-command  - Intent -> docker command');
            console.log();
            resolve(server);
        });
        server.once('error', reject);
    });
}
