import type { ValidationIssue, WrapperEnvelope } from './types';

export function succeeded<T>(data: T, ref: string): WrapperEnvelope<T> {
    return { status: 'success', data, ref };
}

export function failed(error: ValidationIssue[] | string, ref: string): WrapperEnvelope<never> {
    return { status: 'failed', error, ref };
}

/**
 * Response schema shared by the wrapper routes. `error` is either a list of
 * field issues or a generic message, so it is left untyped.
 */
export function envelopeSchema(data: Record<string, { type: string; description?: string }>) {
    return {
        description: 'Outcome envelope; always HTTP 200, branch on `status`',
        type: 'object',
        properties: {
            status: { type: 'string', enum: ['success', 'failed'] },
            data: { type: 'object', properties: data },
            error: { description: 'Validation issues ({ field, message }[]) or a generic message' },
            ref: { type: 'string', description: 'Request correlation id' },
        },
    };
}
