// Workflow routes
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { Services } from '../services/index.js';
import { DefineWorkflowSchema } from '../services/workflows/index.js';
import { AppError } from '../utils/errors.js';
import { parseBody } from './validation.js';

const ExecuteWorkflowSchema = z.object({
  context: z.record(z.unknown()).default({}),
});

interface NameParams {
  Params: { name: string };
}

export async function workflowRoutes(server: FastifyInstance, opts: { services: Services }) {
  const { workflows } = opts.services;

  // POST /v1/workflows - Define (or replace) a workflow
  server.post('/workflows', async (request, reply) => {
    const body = parseBody(DefineWorkflowSchema, request.body);
    const workflow = workflows.defineWorkflow(body.name, body.steps);
    return reply.code(201).send({ workflow });
  });

  // GET /v1/workflows - List workflows
  server.get('/workflows', async () => {
    return { workflows: workflows.listWorkflows() };
  });

  // GET /v1/workflows/executions - Execution history, optionally for one workflow
  server.get<{ Querystring: { workflow?: string } }>('/workflows/executions', async (request) => {
    return { executions: workflows.getExecutionHistory(request.query.workflow || undefined) };
  });

  // GET /v1/workflows/:name - Workflow status
  server.get<NameParams>('/workflows/:name', async (request) => {
    const status = workflows.getWorkflowStatus(request.params.name);
    if (status.status === 'not_found') {
      throw AppError.workflowNotFound(request.params.name);
    }
    return status;
  });

  // POST /v1/workflows/:name/execute - Run a workflow
  server.post<NameParams>('/workflows/:name/execute', async (request) => {
    const body = parseBody(ExecuteWorkflowSchema, request.body);
    return workflows.executeWorkflow(request.params.name, body.context);
  });
}
