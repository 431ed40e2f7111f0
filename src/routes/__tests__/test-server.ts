import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../app.js';
import { createServices, type Services } from '../../services/index.js';
import { FakeProvider } from '../../services/orchestrator/__tests__/fake-provider.js';

export interface TestServer {
  app: FastifyInstance;
  services: Services;
  provider: FakeProvider;
}

/** Builds the full server over a scripted backend with only the calculator registered. */
export async function createTestServer(provider: FakeProvider = new FakeProvider()): Promise<TestServer> {
  const services = createServices({
    provider,
    executor: { databaseUrl: 'sqlite::memory:', functionToolsEnabled: true, functionTimeoutMs: 1000 },
  });
  const app = await buildServer({ services, logger: false });
  await app.ready();
  return { app, services, provider };
}
