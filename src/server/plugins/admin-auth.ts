import { timingSafeEqual } from 'node:crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';

export type AdminAuthHandler = (request: FastifyRequest, reply: FastifyReply) => Promise<void>;

function tokensMatch(presented: string, expected: string): boolean {
    const a = Buffer.from(presented);
    const b = Buffer.from(expected);
    return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Bearer check against a static admin token. Without a token the admin surface is disabled.
 */
export function createAdminAuth(adminToken: string | null): AdminAuthHandler {
    return async function verifyAdminAuth(request, reply) {
        if (!adminToken) {
            await reply.status(503).send({ message: 'Admin API is disabled' });
            return;
        }

        const authHeader = request.headers.authorization;
        if (!authHeader || !authHeader.startsWith('Bearer ')) {
            await reply.status(401).send({ message: 'Authentication required' });
            return;
        }

        const token = authHeader.slice(7).trim();
        if (!token || !tokensMatch(token, adminToken)) {
            await reply.status(401).send({ message: 'Invalid authentication token' });
            return;
        }
    };
}
