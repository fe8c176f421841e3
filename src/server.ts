import Fastify, { type FastifyRequest } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';
import { ulid } from 'ulid';
import { config as defaultConfig, type AppConfig } from './config';
import { createDb } from './db';
import { scheduleExpirySweep } from './db/expiry';
import { redactRequestPath } from './logging';
import { SqliteWrapperStore } from './modules/wrapper/repo';
import { SecretStoreGateway, type SecretStoreGatewayOptions } from './modules/wrapper/service';
import { failed } from './modules/wrapper/response';
import { INTERNAL_ERROR_MESSAGE, ROUTE_NOT_FOUND_MESSAGE, type WrapperStore } from './modules/wrapper/types';
import registerWrapperPostRoute from './modules/wrapper/route.post';
import registerWrapperGetRoute from './modules/wrapper/route.get';

export interface BuildServerOptions {
    /** Defaults to the configuration read from the process environment */
    config?: AppConfig;
    /** Replaces the SQLite store; the expiry sweep then runs against this store */
    store?: WrapperStore;
    gateway?: SecretStoreGatewayOptions;
}

/**
 * Builds and configures the Fastify server instance.
 *
 * Sets up:
 * - Logger that strips query strings and wrapper ids from request URLs
 * - Request correlation ids (`x-request-id` header, else a ULID)
 * - The wrapper store, its gateway and the expiry sweep
 * - Swagger/OpenAPI documentation
 * - Wrapper API routes
 * - Error and not-found handlers that answer with the wrapper envelope
 * - Health check endpoint
 */
export async function buildServer(options: BuildServerOptions = {}) {
    const config = options.config ?? defaultConfig;

    const app = Fastify({
        logger: {
            level: config.logLevel,
            name: `${config.appName}-${config.env}`,
            serializers: {
                req: (req: FastifyRequest) => ({
                    method: req.method,
                    url: redactRequestPath(req.url),
                    remoteAddress: req.socket.remoteAddress,
                }),
            },
        },
        bodyLimit: config.limits.bodyBytes,
        requestIdHeader: 'x-request-id',
        requestIdLogLabel: 'ref',
        genReqId: () => ulid(),
    });

    let store = options.store;
    if (!store) {
        const db = await createDb({ path: config.dbPath, tableName: config.tableName });
        store = new SqliteWrapperStore(db);
        app.addHook('onClose', async () => {
            db.close();
        });
    }

    const stopSweep = scheduleExpirySweep(store, {
        intervalMs: config.expirySweepSeconds * 1000,
        log: app.log,
        now: options.gateway?.now,
    });
    app.addHook('onClose', async () => {
        stopSweep();
    });

    const gateway = new SecretStoreGateway(store, {
        maxIdAttempts: config.limits.idAttempts,
        ...options.gateway,
    });

    if (config.docsEnabled) {
        await app.register(swagger, {
            openapi: {
                openapi: '3.0.0',
                info: { title: `${config.appName} API`, version: '0.1.0' },
                tags: [{ name: 'Wrapper' }],
            },
        });
        await app.register(swaggerUI, { routePrefix: '/docs' });
    }

    // Requests Fastify rejects before a handler runs (bad JSON, wrong content type, oversized body)
    app.setErrorHandler((error, req, reply) => {
        if (error.statusCode !== undefined && error.statusCode < 500) {
            req.log.warn({ err: error }, 'request rejected');
            return reply.status(200).send(failed([{ field: 'body', message: error.message }], req.id));
        }
        req.log.error({ err: error }, INTERNAL_ERROR_MESSAGE);
        return reply.status(200).send(failed(INTERNAL_ERROR_MESSAGE, req.id));
    });

    app.setNotFoundHandler((req, reply) => {
        return reply.status(200).send(failed(ROUTE_NOT_FOUND_MESSAGE, req.id));
    });

    await registerWrapperPostRoute(app, gateway);
    await registerWrapperGetRoute(app, gateway);

    // Health check endpoint for monitoring and container health checks
    app.get('/health', async () => ({ status: 'ok' }));

    return app;
}
