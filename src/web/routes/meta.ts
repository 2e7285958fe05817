import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { classifyPeriod, durationDays } from '../../processing/period-classifier.js';
import { DERIVABILITY_RULE_DESCRIPTIONS } from '../../processing/derivability.js';
import type { AppConfig } from '../../core/config.js';
import { errorToHttpStatus, zodToApiError } from '../serialization.js';

const ClassifyQuery = z.object({
  end: z.string().min(1),
  start: z.string().optional(),
});

export function registerMetaRoutes(server: FastifyInstance, config: AppConfig) {
  server.get('/api/health', async () => {
    return {
      status: 'ok',
      q3_policy: config.q3Policy,
      round_derived: config.roundDerived,
    };
  });

  server.get('/api/derivability/rules', async () => {
    return {
      rules: Object.entries(DERIVABILITY_RULE_DESCRIPTIONS).map(([rule, description]) => ({ rule, description })),
    };
  });

  server.get('/api/periods/classify', async (request, reply) => {
    const query = ClassifyQuery.safeParse(request.query);
    if (!query.success) {
      const error = zodToApiError(query.error);
      return reply.status(errorToHttpStatus(error.type)).send({ error });
    }

    const { start, end } = query.data;
    return {
      start: start ?? null,
      end,
      days: start ? durationDays(start, end) : null,
      mode: classifyPeriod(start ?? null, end),
    };
  });
}
