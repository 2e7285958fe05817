import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { parseFactSet } from '../../core/fact-loader.js';
import { reconstructFactSet, periodsFor } from '../../processing/engine.js';
import { parseDateConstraints } from '../../processing/date-filter.js';
import { classifyDerivability } from '../../processing/derivability.js';
import { serializeReconstruction } from '../../output/json-renderer.js';
import type { AppConfig } from '../../core/config.js';
import { errorToHttpStatus, toApiError, zodToApiError } from '../serialization.js';

const ReconstructBody = z.object({
  fact_set: z.unknown(),
  mode: z.enum(['raw', 'derived']).optional(),
  q3_policy: z.enum(['cumulative_first', 'direct_first']).optional(),
  round: z.boolean().optional(),
  periods: z.enum(['all', 'quarterly', 'yearly']).optional(),
  nature: z.enum(['all', 'instant', 'flow']).optional(),
  concepts: z.array(z.string()).optional(),
  dates: z.array(z.string()).optional(),
});

const DerivabilityBody = z.object({
  concepts: z.array(z.unknown()),
});

export function registerReconstructRoutes(server: FastifyInstance, config: AppConfig) {
  server.post('/api/reconstruct', async (request, reply) => {
    const body = ReconstructBody.safeParse(request.body);
    if (!body.success) {
      const error = zodToApiError(body.error);
      return reply.status(errorToHttpStatus(error.type)).send({ error });
    }

    try {
      const dates = parseDateConstraints(body.data.dates);
      const factSet = parseFactSet(body.data.fact_set, 'fact_set');
      const result = reconstructFactSet(factSet, {
        mode: body.data.mode,
        q3Policy: body.data.q3_policy ?? config.q3Policy,
        roundDerived: body.data.round ?? config.roundDerived,
        nature: body.data.nature,
        concepts: body.data.concepts,
        dates,
      });
      return reply.send(serializeReconstruction(result, periodsFor(body.data.periods ?? 'all')));
    } catch (err) {
      const error = toApiError(err);
      if (error.type === 'internal') throw err;
      return reply.status(errorToHttpStatus(error.type)).send({ error });
    }
  });

  server.post('/api/derivability', async (request, reply) => {
    const body = DerivabilityBody.safeParse(request.body);
    if (!body.success) {
      const error = zodToApiError(body.error);
      return reply.status(errorToHttpStatus(error.type)).send({ error });
    }

    try {
      const { concepts } = parseFactSet({ concepts: body.data.concepts, facts: [] }, 'concepts');
      return reply.send({
        concepts: concepts.map(c => ({ concept: c.concept, ...classifyDerivability(c) })),
      });
    } catch (err) {
      const error = toApiError(err);
      if (error.type === 'internal') throw err;
      return reply.status(errorToHttpStatus(error.type)).send({ error });
    }
  });
}
