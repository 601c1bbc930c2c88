import Fastify, { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import { v4 as uuidv4 } from 'uuid';
import { DomainError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ApiTag {
     name: string;
     description: string;
}

export interface ServerOptions {
     title: string;
     description: string;
     port: number;
     tags: ApiTag[];
     /** Readiness probe; resolves false (or throws) when a dependency is down. */
     checkReady: () => Promise<boolean>;
     /** Fastify request logging, on by default. */
     logRequests?: boolean;
}

function isFastifyError(error: unknown): error is FastifyError {
     return error instanceof Error && 'statusCode' in error;
}

/**
 * Maps any thrown value onto the `{ error, message }` body both APIs return.
 * Domain errors carry their own status; everything else is logged and hidden behind a 500.
 */
export function sendError(
     request: FastifyRequest,
     reply: FastifyReply,
     error: unknown,
     context: string
): FastifyReply {
     if (error instanceof DomainError) {
          if (error.statusCode >= 500) {
               request.log.warn({ err: error, code: error.code }, context);
          }
          return reply.code(error.statusCode).send({
               error: error.code,
               message: error.message,
          });
     }

     request.log.error({ err: error }, context);
     return reply.code(500).send({
          error: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
     });
}

function correlationId(request: { headers: Record<string, string | string[] | undefined> }): string {
     const header = request.headers['x-correlation-id'];
     return typeof header === 'string' && header.length > 0 ? header : `req-${uuidv4()}`;
}

/**
 * Builds a Fastify instance with the pieces every stock service exposes: CORS,
 * OpenAPI docs at /docs, health and readiness probes and a uniform error body.
 * Callers register their route plugins and then call listen (or inject in tests).
 */
export async function createServer(options: ServerOptions): Promise<FastifyInstance> {
     const app = Fastify({
          logger: options.logRequests ?? true,
          requestIdHeader: 'x-correlation-id',
          genReqId: correlationId,
          ajv: {
               customOptions: {
                    removeAdditional: 'all',
                    coerceTypes: true,
                    useDefaults: true,
                    strict: false,
               },
          },
     });

     await app.register(cors, {
          origin: true,
     });

     await app.register(swagger, {
          openapi: {
               info: {
                    title: options.title,
                    description: options.description,
                    version: '1.0.0',
               },
               servers: [{ url: `http://localhost:${options.port}`, description: 'Development' }],
               tags: [...options.tags, { name: 'health', description: 'Health and readiness checks' }],
          },
     });

     await app.register(swaggerUi, {
          routePrefix: '/docs',
          uiConfig: {
               docExpansion: 'list',
               deepLinking: true,
          },
     });

     // Schema validation failures and anything a route did not catch
     app.setErrorHandler((error, request, reply) => {
          if (isFastifyError(error) && error.validation) {
               return reply.code(400).send({
                    error: 'VALIDATION_ERROR',
                    message: error.message,
               });
          }
          if (isFastifyError(error) && error.statusCode && error.statusCode < 500) {
               return reply.code(error.statusCode).send({
                    error: error.code,
                    message: error.message,
               });
          }
          return sendError(request, reply, error, 'Unhandled request error');
     });

     app.get(
          '/health',
          {
               schema: {
                    tags: ['health'],
                    description: 'Basic health check',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ok' },
                                   timestamp: { type: 'string', format: 'date-time' },
                              },
                         },
                    },
               },
          },
          async () => {
               return {
                    status: 'ok',
                    timestamp: new Date().toISOString(),
               };
          }
     );

     app.get(
          '/health/ready',
          {
               schema: {
                    tags: ['health'],
                    description: 'Readiness check with dependency validation',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ready' },
                                   dependencies: {
                                        type: 'object',
                                        properties: {
                                             database: { type: 'string' },
                                        },
                                   },
                              },
                         },
                         503: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string' },
                                   error: { type: 'string' },
                              },
                         },
                    },
               },
          },
          async (_request, reply) => {
               try {
                    const dbHealthy = await options.checkReady();
                    if (!dbHealthy) {
                         reply.code(503);
                         return {
                              status: 'not_ready',
                              error: 'Database connection failed',
                         };
                    }

                    return {
                         status: 'ready',
                         dependencies: {
                              database: 'ok',
                         },
                    };
               } catch (error) {
                    reply.code(503);
                    return {
                         status: 'not_ready',
                         error: error instanceof Error ? error.message : 'Unknown error',
                    };
               }
          }
     );

     return app;
}

/**
 * Listens and wires graceful shutdown. onClose runs after the server stops accepting
 * requests, for pools and timers owned by the entry point.
 */
export async function startServer(
     app: FastifyInstance,
     name: string,
     port: number,
     host: string,
     onClose?: () => Promise<void>
): Promise<void> {
     try {
          await app.listen({ port, host });
          logger.info(`${name} listening on ${host}:${port}`);
          logger.info(`OpenAPI docs available at http://${host}:${port}/docs`);
     } catch (err) {
          logger.error({ err }, 'Failed to start server');
          process.exit(1);
     }

     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          await app.close();
          if (onClose) {
               await onClose();
          }
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);
}
