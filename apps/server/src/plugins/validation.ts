/**
 * Zod validation plugin for Fastify
 * Provides schema validation for request body, query, and params
 */

import type {
  FastifyPluginAsync,
  FastifyRequest,
  preHandlerHookHandler,
} from 'fastify';
import fp from 'fastify-plugin';
import type { ZodType, ZodError } from 'zod';
import { ValidationError, type FieldError } from '../utils/errors.js';

// Validation schema options
export interface ValidationSchemas {
  body?: ZodType;
  query?: ZodType;
  params?: ZodType;
}

declare module 'fastify' {
  interface FastifyInstance {
    validateRequest: (schemas: ValidationSchemas) => preHandlerHookHandler;
  }
}

type RequestPart = keyof ValidationSchemas;

/**
 * Parse Zod error into field-level errors
 */
function parseZodError(part: RequestPart, error: ZodError): FieldError[] {
  return error.issues.map((issue) => ({
    field: [part, ...issue.path.map(String)].join('.'),
    message: issue.message,
  }));
}

const validationPlugin: FastifyPluginAsync = async (app) => {
  /**
   * Create a preHandler that validates request against Zod schemas,
   * replacing each validated part with its parsed/transformed result
   */
  app.decorate('validateRequest', function (schemas: ValidationSchemas): preHandlerHookHandler {
    return async function (request: FastifyRequest): Promise<void> {
      const errors: FieldError[] = [];

      if (schemas.body) {
        const result = schemas.body.safeParse(request.body);
        if (result.success) request.body = result.data;
        else errors.push(...parseZodError('body', result.error));
      }

      if (schemas.query) {
        const result = schemas.query.safeParse(request.query);
        if (result.success) request.query = result.data;
        else errors.push(...parseZodError('query', result.error));
      }

      if (schemas.params) {
        const result = schemas.params.safeParse(request.params);
        if (result.success) request.params = result.data;
        else errors.push(...parseZodError('params', result.error));
      }

      // If any validation errors, throw ValidationError
      if (errors.length > 0) {
        throw new ValidationError('Validation failed', errors);
      }
    };
  });
};

export default fp(validationPlugin, {
  name: 'validation',
});
