/**
 * HTTP facade
 *
 * POST /requirements loads an egg and answers with the canonical descriptor
 * JSON, so a front end can build its own configuration form.
 */

import { type } from 'arktype';
import { getRuntimeSettings } from '../core/config/index.js';
import Fastify, { type FastifyInstance } from 'fastify';
import { descriptorToJson, parseEgg } from '../core/egg/index.js';
import { FetchError, FormatError, formatArktypeErrors } from '../core/errors.js';
import { getComponentLogger } from '../core/logging/index.js';
import { type EggSource, loadEggJson } from '../core/source/index.js';

const logger = getComponentLogger('api');

export const requirementsRequestSchema = type({
  source: 'string',
});

export interface ServerOptions {
  loadEgg?: (source: string) => Promise<EggSource>;
}

export function buildServer(options: ServerOptions = {}): FastifyInstance {
  const loadEgg = options.loadEgg ?? ((source: string) => loadEggJson(source));
  const app = Fastify({ logger: false });

  app.get('/health', async () => ({ status: 'ok' }));

  app.post('/requirements', async (request, reply) => {
    const body = requirementsRequestSchema(request.body);
    if (body instanceof type.errors) {
      return reply.code(422).send({ detail: formatArktypeErrors(body) });
    }

    let source: EggSource;
    try {
      source = await loadEgg(body.source);
    } catch (error) {
      if (error instanceof FetchError) {
        logger.warn('Egg fetch failed', { source: body.source, reason: error.message });
        return reply.code(502).send({ detail: error.message });
      }
      throw error;
    }

    try {
      return reply.send(descriptorToJson(parseEgg(source.data)));
    } catch (error) {
      if (error instanceof FormatError) {
        return reply.code(400).send({ detail: `Failed to parse egg: ${error.message}` });
      }
      throw error;
    }
  });

  return app;
}

/**
 * Start the HTTP facade on the host and port from the environment
 */
export async function startServer(env: NodeJS.ProcessEnv = process.env): Promise<FastifyInstance> {
  const settings = getRuntimeSettings(env);
  const app = buildServer({
    loadEgg: (source) => loadEggJson(source, { timeoutMs: settings.fetchTimeoutMs }),
  });
  const address = await app.listen({ host: settings.apiHost, port: settings.apiPort });
  logger.info('kubeegg API listening', { address });
  return app;
}
