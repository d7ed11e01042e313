import type { FastifyInstance } from 'fastify';

export const registerMetricsHooks = (app: FastifyInstance) => {
  const metrics = app.registryMetrics;

  app.addHook('onRequest', async (request) => {
    request.metrics = {
      startTime: process.hrtime.bigint(),
      route: request.routeOptions.url ?? request.url
    };
  });

  app.addHook('onResponse', async (request, reply) => {
    if (!request.metrics) return;
    const duration = Number(process.hrtime.bigint() - request.metrics.startTime) / 1_000_000;
    const labels = {
      route: request.metrics.route,
      method: request.method,
      statusCode: reply.statusCode.toString()
    };
    metrics.requestCounter.labels(labels).inc();
    metrics.requestDurationMs.labels(labels).observe(duration);
  });
};

export const registerMetricsRoute = (app: FastifyInstance) => {
  const metrics = app.registryMetrics;

  app.get('/metrics', { schema: { hide: true } }, async (request, reply) => {
    if (app.config.NODE_ENV === 'production') {
      return reply.code(404).send();
    }
    reply.header('Content-Type', metrics.registry.contentType);
    return reply.send(await metrics.registry.metrics());
  });
};
