// Toolflow API
// Port: 3737 (localhost only)

// Load environment variables from .env file
import 'dotenv/config';

import { buildServer } from './app.js';
import { env, logConfiguration } from './env.js';

const server = await buildServer();

try {
  await server.listen({ port: env.PORT, host: env.HOST });
  server.log.info(`Toolflow API listening on http://${env.HOST}:${env.PORT}`);
  server.log.info(`Health: http://${env.HOST}:${env.PORT}/v1/health`);
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
