import Fastify from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { fileURLToPath } from 'url';
import { dirname, join, resolve } from 'path';
import { mkdirSync } from 'fs';
import { config } from './config.js';
import { initRuleStore, closeRuleStore } from './rules/store.js';
import { initFactStore, closeFactStore } from './facts/store.js';
import { registerFactRoutes } from './facts/routes.js';
import { initEligibilityStore, closeEligibilityStore } from './eligibility/store.js';
import { registerEligibilityRoutes } from './eligibility/routes.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Ensure data directories exist for SQLite databases
for (const dbPath of [config.storage.ruleDbPath, config.storage.factDbPath, config.storage.eligibilityDbPath]) {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
}

initRuleStore(config.storage.ruleDbPath);
initFactStore(config.storage.factDbPath);
initEligibilityStore(config.storage.eligibilityDbPath);

const server = Fastify({
  logger: {
    level: config.logLevel,
  },
});

const apiSpecDir = resolve(__dirname, '..', 'docs', 'api');
await server.register(swagger, {
  mode: 'static',
  specification: {
    path: join(apiSpecDir, 'openapi.yaml'),
    baseDir: apiSpecDir,
  },
});

await server.register(swaggerUi, {
  routePrefix: '/docs',
});

server.get('/', async () => {
  return {
    name: 'Eligibility Engine',
    version: '0.1.0',
    endpoints: ['/health', '/v1/cases/:case_id/facts', '/v1/eligibility-checks', '/v1/eligibility-results', '/docs'],
  };
});

server.get('/health', async () => {
  return { status: 'ok' };
});

// Register v1 API routes
await server.register(
  async (v1) => {
    registerFactRoutes(v1);
    registerEligibilityRoutes(v1);
  },
  { prefix: '/v1' }
);

// Graceful shutdown: close stores (reverse of init order)
server.addHook('onClose', async () => {
  closeEligibilityStore();
  closeFactStore();
  closeRuleStore();
});

const start = async () => {
  try {
    await server.listen({ port: config.port, host: '0.0.0.0' });
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
};

await start();
