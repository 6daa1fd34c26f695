import Fastify, { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit, { RateLimitPluginOptions } from '@fastify/rate-limit';
import compress from '@fastify/compress';
import { serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import { ZodError } from 'zod';
import * as Sentry from '@sentry/node';
import { config } from './config/env';
import { loggerOptions } from './infrastructure/logger';
import { getRedisClient } from './infrastructure/redis';
import { createServices, type AppServices } from './container';
import orderLineRoutes from './routes/orderLineRoutes';
import stockRoutes from './routes/stockRoutes';
import catalogRoutes from './routes/catalogRoutes';
import { AppError } from './utils/errors';

export type BuildAppOptions = {
  services?: AppServices;
};

type ValidationIssue = { path: string; message: string };

function validationDetails(error: FastifyError | AppError): ValidationIssue[] {
  if (error instanceof ZodError) {
    return error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
  }
  if ('validation' in error && error.validation) {
    return error.validation.map((v) => ({ path: v.instancePath.replace(/^\//, '').replace(/\//g, '.'), message: v.message ?? 'invalid' }));
  }
  return [{ path: '', message: error.message }];
}

export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const services = options.services ?? createServices();

  const app = Fastify({
    // Behind a reverse proxy: rate limiting keys on the client address from X-Forwarded-For
    trustProxy: true,
    logger: loggerOptions,
  });

  app.register(helmet, {
    contentSecurityPolicy: config.NODE_ENV === 'production',
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });

  if (config.ENABLE_RATE_LIMIT === 'true') {
    const rateLimitConfig: RateLimitPluginOptions = {
      max: 100,
      timeWindow: '1 minute',
      ...(config.REDIS_URL ? { redis: getRedisClient() } : {}),
    };
    app.register(rateLimit, rateLimitConfig);
  }

  app.register(compress, { global: true });

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  if (config.NODE_ENV !== 'production') {
    app.register(cors, {
      origin: ['http://localhost:3000'],
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type'],
    });
  } else {
    app.register(cors, {
      origin: config.FRONTEND_URL ? [config.FRONTEND_URL] : false,
    });
  }

  // The first index is built before the server accepts requests; an inconsistent catalog fails startup
  app.addHook('onReady', async () => {
    await services.catalog.rebuild();
  });

  app.register(orderLineRoutes, { prefix: '/order-lines', services });
  app.register(stockRoutes, { prefix: '/stock', services });
  app.register(catalogRoutes, { prefix: '/catalog', services });

  app.get('/health', async () => {
    return { status: 'ok', catalogEntries: services.catalog.current().size };
  });

  app.setErrorHandler((error: FastifyError | AppError, request, reply) => {
    // The zod validator compiler hands Fastify the ZodError itself, tagged FST_ERR_VALIDATION
    if (error instanceof ZodError || error.code === 'FST_ERR_VALIDATION') {
      return reply.status(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request data',
          details: validationDetails(error),
        },
      });
    }

    const statusCode = error.statusCode ?? 500;
    const code = error instanceof AppError ? error.code : statusCode < 500 && error.code ? error.code : 'INTERNAL_ERROR';

    if (statusCode >= 500) {
      request.log.error({ err: error, code }, error.message);

      Sentry.withScope((scope) => {
        scope.setContext('request', { method: request.method, url: request.url });
        scope.setTag('error_code', code);
        scope.setTag('status_code', String(statusCode));
        Sentry.captureException(error);
      });
    } else {
      request.log.warn({ code, statusCode, message: error.message }, 'Request failed');
    }

    return reply.status(statusCode).send({
      error: {
        code,
        message: statusCode >= 500 && !(error instanceof AppError) ? 'Something went wrong' : error.message,
        ...(error instanceof AppError && error.details ? { details: error.details } : {}),
      },
    });
  });

  return app;
}
