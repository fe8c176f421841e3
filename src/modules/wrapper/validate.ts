import { z } from 'zod';
import { config } from '../../config';
import type { CreateWrapperInput, ValidationIssue, ValidationResult } from './types';

const FIELD_REQUIRED = 'field required';

/**
 * Reads a TTL given either as an integer or as a string of decimal digits.
 * Returns null for anything else.
 */
function parseSeconds(raw: unknown): number | null {
    if (typeof raw === 'number') {
        return Number.isSafeInteger(raw) ? raw : null;
    }
    if (typeof raw === 'string') {
        const trimmed = raw.trim();
        if (!/^[+-]?\d+$/.test(trimmed)) return null;
        const seconds = Number(trimmed);
        return Number.isSafeInteger(seconds) ? seconds : null;
    }
    return null;
}

const TtlSchema = z.unknown().transform((raw, ctx) => {
    const seconds = parseSeconds(raw);
    if (seconds === null) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: raw === undefined ? FIELD_REQUIRED : 'must be an integer number of seconds',
        });
        return z.NEVER;
    }
    if (seconds < config.limits.minTtlSeconds) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `must be at least ${config.limits.minTtlSeconds} seconds`,
        });
        return z.NEVER;
    }
    // Keeps now + ttl a safe integer
    if (seconds > config.limits.maxTtlSeconds) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `must be at most ${config.limits.maxTtlSeconds} seconds`,
        });
        return z.NEVER;
    }
    return seconds;
});

// Ids double as storage keys and URL path segments
const IdSchema = z
    .string({ required_error: FIELD_REQUIRED, invalid_type_error: 'must be a string' })
    .min(1, 'must not be empty')
    .regex(/^[A-Za-z0-9]*$/, 'contains invalid characters');

const CreatePayloadSchema = z.object(
    {
        value: z.string({ required_error: FIELD_REQUIRED, invalid_type_error: 'must be a string' }),
        ttl: TtlSchema,
    },
    { required_error: 'must be a JSON object', invalid_type_error: 'must be a JSON object' },
);

function toIssues(error: z.ZodError, field?: string): ValidationIssue[] {
    return error.issues.map((issue) => {
        const path = [...(field ? [field] : []), ...issue.path.map(String)];
        return { field: path.length > 0 ? path.join('.') : 'body', message: issue.message };
    });
}

/**
 * Checks a TTL in seconds. Accepts integers and decimal strings, rejects
 * anything outside the configured minimum and maximum.
 *
 * @param {unknown} ttl - Raw `ttl` field from the request body
 * @returns {ValidationResult<number>} The TTL in seconds, or the `ttl` issues
 */
export function validateTtl(ttl: unknown): ValidationResult<number> {
    const parsed = TtlSchema.safeParse(ttl);
    if (!parsed.success) return { success: false, error: toIssues(parsed.error, 'ttl') };
    return { success: true, data: parsed.data };
}

/**
 * Checks that a wrapper id is a non-empty alphanumeric string.
 *
 * @param {unknown} id - Raw id taken from the request path
 * @returns {ValidationResult<string>} The id, or the `id` issues
 */
export function validateId(id: unknown): ValidationResult<string> {
    const parsed = IdSchema.safeParse(id);
    if (!parsed.success) return { success: false, error: toIssues(parsed.error, 'id') };
    return { success: true, data: parsed.data };
}

/**
 * Checks a create request body: `value` must be a string (empty is fine) and
 * `ttl` must pass {@link validateTtl}. Issues for every failing field are
 * reported together.
 *
 * @param {unknown} body - Parsed request body
 * @returns {ValidationResult<CreateWrapperInput>} The normalized input, or every issue found
 */
export function validateCreatePayload(body: unknown): ValidationResult<CreateWrapperInput> {
    const parsed = CreatePayloadSchema.safeParse(body);
    if (!parsed.success) return { success: false, error: toIssues(parsed.error) };
    return { success: true, data: parsed.data };
}
