// Generation route
// Plain completion, or with useTools the text-marker tool loop over one client's tools
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { Services } from '../services/index.js';
import { parseBody } from './validation.js';

const GenerateSchema = z.object({
  prompt: z.string().min(1),
  maxTokens: z.number().int().positive().max(32768).optional(),
  temperature: z.number().min(0).max(2).optional(),
  stop: z.array(z.string()).optional(),
  useTools: z.boolean().default(false),
  clientId: z.string().optional(),
  maxToolCalls: z.number().int().min(0).max(16).optional(),
});

export async function generationRoutes(server: FastifyInstance, opts: { services: Services }) {
  const { agentService } = opts.services;

  // POST /v1/generate
  server.post('/generate', async (request) => {
    const body = parseBody(GenerateSchema, request.body);

    if (body.useTools) {
      return agentService.generateWithTools({
        prompt: body.prompt,
        clientId: body.clientId,
        maxToolCalls: body.maxToolCalls,
        maxTokens: body.maxTokens,
        temperature: body.temperature,
        stop: body.stop,
      });
    }

    return agentService.generate(body.prompt, {
      maxTokens: body.maxTokens,
      temperature: body.temperature,
      stop: body.stop,
    });
  });
}
