import type { preHandlerHookHandler } from 'fastify';
import type { ZodError, ZodSchema } from 'zod';

type RequestPart = 'body' | 'query';

const PART_LABELS: Record<RequestPart, string> = {
  body: 'Request body',
  query: 'Query parameter',
};

/**
 * Formats Zod validation errors into a structured array of field errors.
 */
function formatZodErrors(error: ZodError): Array<{ field: string; message: string }> {
  return error.issues.map((issue) => ({
    field: issue.path.join('.') || '(root)',
    message: issue.message,
  }));
}

/**
 * Builds a preHandler that validates one part of the request against a Zod
 * schema and replaces it with the parsed (coerced, defaulted) value. On
 * failure it answers 400 with the field errors. An absent body is
 * validated as `{}`.
 */
function validatePart<T>(part: RequestPart, schema: ZodSchema<T>): preHandlerHookHandler {
  return (request, reply, done) => {
    const input = part === 'body' ? (request.body ?? {}) : request.query;
    const result = schema.safeParse(input);

    if (!result.success) {
      void reply.status(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: `${PART_LABELS[part]} validation failed`,
          details: formatZodErrors(result.error),
        },
      });
      return;
    }

    request[part] = result.data;
    done();
  };
}

export function validateBody<T>(schema: ZodSchema<T>): preHandlerHookHandler {
  return validatePart('body', schema);
}

export function validateQuery<T>(schema: ZodSchema<T>): preHandlerHookHandler {
  return validatePart('query', schema);
}
