// Course Assistant API
// Port: 3737 (localhost only)

// Load environment variables from .env file
import 'dotenv/config';

import { buildServer } from './app.js';
import { describeConfiguration, env } from './env.js';
import { logger } from './logger.js';
import { loadCourseCatalog } from './services/catalog.js';
import { initializeTools, toolRegistry } from './services/tools/index.js';

const catalog = await loadCourseCatalog(env.COURSE_CATALOG_PATH);
initializeTools(catalog, toolRegistry);

const server = await buildServer({ catalog, registry: toolRegistry });

try {
  await server.listen({ port: env.PORT, host: env.HOST });
  logger.info(describeConfiguration(), 'Course Assistant API configuration');
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
