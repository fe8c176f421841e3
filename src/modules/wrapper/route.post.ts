import type { FastifyInstance } from 'fastify';
import type { SecretStoreGateway } from './service';
import { validateCreatePayload } from './validate';
import { envelopeSchema, failed, succeeded } from './response';
import { INTERNAL_ERROR_MESSAGE, type CreateWrapperData } from './types';

/**
 * Registers POST /v1/wrapper, which stores a value and returns the id that
 * retrieves it once.
 *
 * The body is checked in the handler, not by a route schema; invalid input is
 * answered with the 200 failure envelope.
 *
 * @param {FastifyInstance} app - Fastify server instance
 * @param {SecretStoreGateway} gateway - Gateway the handler stores wrappers through
 */
export default async function registerWrapperPostRoute(app: FastifyInstance, gateway: SecretStoreGateway) {
    app.post<{ Body: unknown }>('/v1/wrapper', {
        schema: {
            summary: 'Create wrapper',
            description: 'Store `value` for `ttl` seconds (minimum 30, integer or decimal string). Returns the wrapper id and its expiry in epoch seconds.',
            tags: ['Wrapper'],
            response: {
                200: envelopeSchema({
                    id: { type: 'string', description: 'Wrapper id (32 hex characters)' },
                    expire: { type: 'integer', description: 'Expiry (epoch seconds)' },
                }),
            },
        },
    }, async (req, reply) => {
        try {
            const parsed = validateCreatePayload(req.body);
            if (!parsed.success) {
                req.log.warn({ issues: parsed.error }, 'create payload failed validation');
                return reply.send(failed(parsed.error, req.id));
            }

            const created = await gateway.create(parsed.data.value, parsed.data.ttl);
            req.log.info({ expire: created.expireAt }, 'wrapper created');
            return reply.send(succeeded<CreateWrapperData>({ id: created.id, expire: created.expireAt }, req.id));
        } catch (error) {
            req.log.error({ err: error }, INTERNAL_ERROR_MESSAGE);
            return reply.send(failed(INTERNAL_ERROR_MESSAGE, req.id));
        }
    });
}
