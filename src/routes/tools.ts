// Tool routes
// Every route takes an optional ?clientId= selecting the registry scope
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { Services } from '../services/index.js';
import { DEFAULT_SCOPE, executeRequest, parseToolDescriptor } from '../services/tools/index.js';
import { AppError } from '../utils/errors.js';
import { parseBody, type ScopeQuery } from './validation.js';

const ExecuteToolSchema = z.object({
  toolName: z.string().min(1),
  parameters: z.record(z.unknown()).default({}),
  headers: z.record(z.string()).optional(),
});

const ConfigPatchSchema = z.record(z.unknown());

interface NameParams {
  Params: { name: string };
}

export async function toolRoutes(server: FastifyInstance, opts: { services: Services }) {
  const { tools, executor } = opts.services;

  // GET /v1/tools - List tools in a scope
  server.get<ScopeQuery>('/tools', async (request) => {
    const clientId = request.query.clientId || DEFAULT_SCOPE;
    const infos = tools.list(clientId).map(tool => tools.getInfo(tool.name, clientId));
    return { clientId, tools: infos };
  });

  // POST /v1/tools - Register a tool
  server.post<ScopeQuery>('/tools', async (request, reply) => {
    const clientId = request.query.clientId || DEFAULT_SCOPE;
    const descriptor = parseToolDescriptor(request.body);
    tools.register(descriptor, clientId);
    return reply.code(201).send({ tool: tools.getInfo(descriptor.name, clientId) });
  });

  // POST /v1/tools/execute - Run a tool directly
  server.post<ScopeQuery>('/tools/execute', async (request) => {
    const clientId = request.query.clientId || DEFAULT_SCOPE;
    const body = parseBody(ExecuteToolSchema, request.body);
    return executeRequest(
      tools,
      executor,
      { toolName: body.toolName, parameters: body.parameters },
      clientId,
      { headers: body.headers },
    );
  });

  // GET /v1/tools/:name - Tool info
  server.get<ScopeQuery & NameParams>('/tools/:name', async (request) => {
    const clientId = request.query.clientId || DEFAULT_SCOPE;
    const info = tools.getInfo(request.params.name, clientId);
    if (!info) {
      throw AppError.toolNotFound(request.params.name);
    }
    return { tool: info };
  });

  // DELETE /v1/tools/:name - Remove a tool
  server.delete<ScopeQuery & NameParams>('/tools/:name', async (request) => {
    const clientId = request.query.clientId || DEFAULT_SCOPE;
    if (!tools.remove(request.params.name, clientId)) {
      throw AppError.toolNotFound(request.params.name);
    }
    return { deleted: true, name: request.params.name };
  });

  // PUT /v1/tools/:name/config - Merge into a tool's config
  server.put<ScopeQuery & NameParams>('/tools/:name/config', async (request) => {
    const clientId = request.query.clientId || DEFAULT_SCOPE;
    const patch = parseBody(ConfigPatchSchema, request.body);
    if (!tools.updateConfig(request.params.name, patch, clientId)) {
      throw AppError.toolNotFound(request.params.name);
    }
    return { tool: tools.getInfo(request.params.name, clientId) };
  });
}
