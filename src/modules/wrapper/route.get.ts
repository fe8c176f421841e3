import type { FastifyInstance } from 'fastify';
import type { SecretStoreGateway } from './service';
import { validateId } from './validate';
import { envelopeSchema, failed, succeeded } from './response';
import { INTERNAL_ERROR_MESSAGE, NOT_FOUND_MESSAGE, type RetrieveWrapperData } from './types';

/**
 * Registers GET /v1/wrapper/:id, which returns the stored value and deletes it.
 *
 * Unknown, already consumed and expired ids all produce the same failure.
 *
 * @param {FastifyInstance} app - Fastify server instance
 * @param {SecretStoreGateway} gateway - Gateway the handler retrieves wrappers through
 */
export default async function registerWrapperGetRoute(app: FastifyInstance, gateway: SecretStoreGateway) {
    app.get<{ Params: { id: string } }>('/v1/wrapper/:id', {
        schema: {
            summary: 'Retrieve wrapper',
            description: 'Return the wrapped value and delete it. A second retrieval of the same id fails.',
            tags: ['Wrapper'],
            params: {
                type: 'object',
                properties: {
                    id: { type: 'string', description: 'Wrapper id' },
                },
            },
            response: {
                200: envelopeSchema({
                    id: { type: 'string' },
                    value: { type: 'string' },
                    expire: { type: 'integer', description: 'Expiry (epoch seconds)' },
                }),
            },
        },
    }, async (req, reply) => {
        try {
            const parsed = validateId(req.params.id);
            if (!parsed.success) {
                req.log.warn({ issues: parsed.error }, 'wrapper id failed validation');
                return reply.send(failed(parsed.error, req.id));
            }

            const record = await gateway.retrieveAndDelete(parsed.data);
            if (!record) {
                req.log.info(NOT_FOUND_MESSAGE);
                return reply.send(failed(NOT_FOUND_MESSAGE, req.id));
            }

            req.log.info('wrapper retrieved');
            return reply.send(succeeded<RetrieveWrapperData>({ id: record.id, value: record.value, expire: record.expireAt }, req.id));
        } catch (error) {
            req.log.error({ err: error }, INTERNAL_ERROR_MESSAGE);
            return reply.send(failed(INTERNAL_ERROR_MESSAGE, req.id));
        }
    });
}
