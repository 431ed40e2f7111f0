// Agent routes
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { Services } from '../services/index.js';
import { AppError } from '../utils/errors.js';
import { parseBody } from './validation.js';

const CreateAgentSchema = z.object({
  name: z.string().min(1).max(128),
  description: z.string().default(''),
  rolePrompt: z.string().default('You are a helpful assistant.'),
  tools: z.array(z.string().min(1)).default([]),
});

const AssignToolsSchema = z.object({
  toolNames: z.array(z.string().min(1)),
});

const InvokeAgentSchema = z.object({
  prompt: z.string().min(1),
  maxTokens: z.number().int().positive().max(32768).optional(),
  temperature: z.number().min(0).max(2).optional(),
  stop: z.array(z.string()).optional(),
  useTools: z.boolean().optional(),
  maxToolCalls: z.number().int().min(0).max(16).optional(),
  toolsForUse: z.array(z.string()).optional(),
  sessionId: z.string().optional(),
});

interface NameParams {
  Params: { name: string };
}

export async function agentRoutes(server: FastifyInstance, opts: { services: Services }) {
  const { agents, agentService } = opts.services;

  // POST /v1/agents - Register an agent
  server.post('/agents', async (request, reply) => {
    const body = parseBody(CreateAgentSchema, request.body);
    const agent = agents.register(body);
    return reply.code(201).send({ agent });
  });

  // GET /v1/agents - List agents
  server.get('/agents', async () => {
    return { agents: agents.list() };
  });

  // DELETE /v1/agents/:name - Remove an agent
  server.delete<NameParams>('/agents/:name', async (request) => {
    if (!agents.remove(request.params.name)) {
      throw AppError.agentNotFound(request.params.name);
    }
    return { deleted: true, name: request.params.name };
  });

  // POST /v1/agents/:name/tools - Replace the agent's tool list
  server.post<NameParams>('/agents/:name/tools', async (request) => {
    const body = parseBody(AssignToolsSchema, request.body);
    return { agent: agents.assignTools(request.params.name, body.toolNames) };
  });

  // POST /v1/agents/:name/invoke - Run the agent
  server.post<NameParams>('/agents/:name/invoke', async (request) => {
    const body = parseBody(InvokeAgentSchema, request.body);
    return agentService.invokeAgent(request.params.name, body);
  });
}
