// src/server.ts
// Fastify application assembly. Listening happens in main.ts so tests can
// build the app and drive it with inject().
import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';

import { config } from './config';
import { registerObservability, requestIdGenerator } from './observability';

import healthRoutes from './routes/health';
import metricsRoutes from './routes/metrics';
import { complianceRoutes } from './routes/compliance';

export async function buildServer(): Promise<FastifyInstance> {
  const app = Fastify({
    // Request logging goes through the pino hooks in observability/
    logger: false,
    genReqId: requestIdGenerator,
    bodyLimit: config.server.bodyLimit,
  });

  registerObservability(app);

  await app.register(cors, { origin: [...config.cors.origins] });

  await app.register(healthRoutes);
  await app.register(metricsRoutes);
  await app.register(complianceRoutes);

  return app;
}
