import { afterEach, describe, it, expect, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createServer, registerRoutes, type ServerDeps } from '../../src/server/index.js';

const AUTH = { authorization: 'Bearer test-secret' };

function fakeDeps(overrides: Partial<ServerDeps> = {}): ServerDeps {
    return {
        scheduler: {
            enqueueIngest: vi.fn(async (userId: number) => ({ jobId: `ingest-${userId}`, enqueued: true })),
            sweep: vi.fn(async () => ({ checked: 2, due: 1, enqueued: 1 })),
        },
        pingRedis: async () => true,
        pingDatabase: async () => true,
        queueCounts: async () => ({ 'ingest-queue': { waiting: 1, active: 0, delayed: 0, failed: 0 } }),
        refreshQueueMetrics: vi.fn(async () => { }),
        adminToken: 'test-secret',
        ...overrides,
    };
}

describe('HTTP surface', () => {
    let app: FastifyInstance;

    async function build(deps: ServerDeps): Promise<FastifyInstance> {
        app = createServer();
        await registerRoutes(app, deps);
        return app;
    }

    afterEach(async () => {
        await app.close();
    });

    describe('GET /health', () => {
        it('reports healthy', async () => {
            const server = await build(fakeDeps());

            const response = await server.inject({ method: 'GET', url: '/health' });

            expect(response.statusCode).toBe(200);
            expect(response.json()).toMatchObject({ status: 'healthy' });
        });
    });

    describe('GET /ready', () => {
        it('is ready when both dependencies answer', async () => {
            const server = await build(fakeDeps());

            const response = await server.inject({ method: 'GET', url: '/ready' });

            expect(response.statusCode).toBe(200);
            expect(response.json()).toEqual({
                status: 'ready',
                dependencies: { redis: 'connected', database: 'connected' },
            });
        });

        it('returns 503 naming the dependency that is down', async () => {
            const server = await build(fakeDeps({ pingRedis: async () => false }));

            const response = await server.inject({ method: 'GET', url: '/ready' });

            expect(response.statusCode).toBe(503);
            expect(response.json()).toEqual({
                status: 'not_ready',
                dependencies: { redis: 'disconnected', database: 'connected' },
            });
        });
    });

    describe('GET /metrics', () => {
        it('refreshes queue gauges before rendering', async () => {
            const deps = fakeDeps();
            const server = await build(deps);

            const response = await server.inject({ method: 'GET', url: '/metrics' });

            expect(response.statusCode).toBe(200);
            expect(response.headers['content-type']).toContain('text/plain');
            expect(deps.refreshQueueMetrics).toHaveBeenCalledTimes(1);
        });
    });

    describe('POST /admin/ingest/:userId', () => {
        it('requires a bearer token', async () => {
            const server = await build(fakeDeps());

            const response = await server.inject({ method: 'POST', url: '/admin/ingest/7' });

            expect(response.statusCode).toBe(401);
            expect(response.json()).toEqual({ message: 'Authentication required' });
        });

        it('rejects a wrong token', async () => {
            const server = await build(fakeDeps());

            const response = await server.inject({
                method: 'POST',
                url: '/admin/ingest/7',
                headers: { authorization: 'Bearer not-the-token' },
            });

            expect(response.statusCode).toBe(401);
            expect(response.json()).toEqual({ message: 'Invalid authentication token' });
        });

        it('is disabled without a configured token', async () => {
            const server = await build(fakeDeps({ adminToken: null }));

            const response = await server.inject({ method: 'POST', url: '/admin/ingest/7', headers: AUTH });

            expect(response.statusCode).toBe(503);
            expect(response.json()).toEqual({ message: 'Admin API is disabled' });
        });

        it('queues a manual ingestion', async () => {
            const deps = fakeDeps();
            const server = await build(deps);

            const response = await server.inject({ method: 'POST', url: '/admin/ingest/7', headers: AUTH });

            expect(response.statusCode).toBe(202);
            expect(response.json()).toEqual({
                success: true,
                jobId: 'ingest-7',
                enqueued: true,
                message: 'Ingestion queued for user 7',
            });
            expect(deps.scheduler.enqueueIngest).toHaveBeenCalledWith(7, 'manual');
        });

        it('reports a job that is already pending', async () => {
            const server = await build(fakeDeps({
                scheduler: {
                    enqueueIngest: async (userId: number) => ({ jobId: `ingest-${userId}`, enqueued: false }),
                    sweep: async () => ({ checked: 0, due: 0, enqueued: 0 }),
                },
            }));

            const response = await server.inject({ method: 'POST', url: '/admin/ingest/7', headers: AUTH });

            expect(response.statusCode).toBe(202);
            expect(response.json()).toMatchObject({ enqueued: false, message: 'Ingestion already pending for user 7' });
        });

        it('rejects a non-numeric user id', async () => {
            const server = await build(fakeDeps());

            const response = await server.inject({ method: 'POST', url: '/admin/ingest/abc', headers: AUTH });

            expect(response.statusCode).toBe(400);
            expect(response.json()).toEqual({ success: false, message: 'userId must be a positive integer' });
        });
    });

    describe('admin inspection', () => {
        it('runs a sweep on demand', async () => {
            const server = await build(fakeDeps());

            const response = await server.inject({ method: 'POST', url: '/admin/sweep', headers: AUTH });

            expect(response.statusCode).toBe(200);
            expect(response.json()).toEqual({ success: true, checked: 2, due: 1, enqueued: 1 });
        });

        it('lists queue counts', async () => {
            const server = await build(fakeDeps());

            const response = await server.inject({ method: 'GET', url: '/admin/queues', headers: AUTH });

            expect(response.json()).toEqual({ 'ingest-queue': { waiting: 1, active: 0, delayed: 0, failed: 0 } });
        });
    });
});
