/**
 * Admin routes for manual triggers and inspection
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { logger } from '../../observability/logger.js';
import type { QueueCounts } from '../../queues/index.js';
import type { SweepResult } from '../../services/scheduler.service.js';
import { errorMessage } from '../../utils/errors.js';
import { createAdminAuth } from '../plugins/admin-auth.js';
import type { ServerDeps } from '../types.js';

const userIdParamsSchema = z.object({
    userId: z.coerce.number().int().positive(),
});

interface IngestTriggerResponse {
    success: boolean;
    jobId?: string;
    enqueued?: boolean;
    message: string;
}

type SweepResponse = ({ success: true } & SweepResult) | { success: false; message: string };

export async function adminRoutes(fastify: FastifyInstance, deps: ServerDeps): Promise<void> {
    const verifyAdminAuth = createAdminAuth(deps.adminToken);

    /**
     * Queue ingestion for one user
     * POST /admin/ingest/:userId
     */
    fastify.post<{ Params: { userId: string }; Reply: IngestTriggerResponse }>(
        '/admin/ingest/:userId',
        { preHandler: verifyAdminAuth },
        async (request, reply) => {
            const parsed = userIdParamsSchema.safeParse(request.params);
            if (!parsed.success) {
                return reply.status(400).send({
                    success: false,
                    message: 'userId must be a positive integer',
                });
            }

            const { userId } = parsed.data;
            try {
                const { jobId, enqueued } = await deps.scheduler.enqueueIngest(userId, 'manual');
                logger.info('Admin triggered ingestion', { userId, jobId, enqueued, requestId: request.id });

                return reply.status(202).send({
                    success: true,
                    jobId,
                    enqueued,
                    message: enqueued
                        ? `Ingestion queued for user ${userId}`
                        : `Ingestion already pending for user ${userId}`,
                });
            } catch (error) {
                logger.error('Admin ingest trigger failed', error, { userId });
                return reply.status(500).send({
                    success: false,
                    message: errorMessage(error),
                });
            }
        }
    );

    /**
     * Run the due-user sweep now
     * POST /admin/sweep
     */
    fastify.post<{ Reply: SweepResponse }>(
        '/admin/sweep',
        { preHandler: verifyAdminAuth },
        async (_request, reply) => {
            try {
                const result = await deps.scheduler.sweep();
                return reply.send({ success: true, ...result });
            } catch (error) {
                logger.error('Admin sweep failed', error);
                return reply.status(500).send({ success: false, message: errorMessage(error) });
            }
        }
    );

    /**
     * Job counts per queue
     * GET /admin/queues
     */
    fastify.get<{ Reply: Record<string, QueueCounts> }>(
        '/admin/queues',
        { preHandler: verifyAdminAuth },
        async (_request, reply) => {
            return reply.send(await deps.queueCounts());
        }
    );
}
