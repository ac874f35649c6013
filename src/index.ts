import { serve } from "@hono/node-server";
import { logger } from "./logger";
import { loadConfig, type AppConfig } from "./config";
import { createApp } from "./app";
import { InterviewPrepService } from "./service";

logger.info("═══════════════════════════════════════════════════");
logger.info("  Interview Prep Engine");
logger.info("═══════════════════════════════════════════════════");

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  logger.error("Failed to load configuration:", error);
  process.exit(1);
}

const service = new InterviewPrepService(config);

const roles = service.roles();
const questions = service.questions();
if (roles.length === 0) {
  logger.warn(`No job roles loaded from ${config.env.jobRolesPath}`);
}
if (questions.length === 0) {
  logger.warn(`No questions loaded from ${config.env.questionsPath}`);
}
logger.info(`Catalog: ${roles.length} roles, ${questions.length} questions`);

const app = createApp(service, config);
const port = config.env.port;

logger.info(`Starting server on port ${port}...`);

const server = serve({ fetch: app.fetch, port }, (info) => {
  logger.info(`✅ Interview Prep Engine started on http://localhost:${info.port}`);
  logger.info(`   Health:  http://localhost:${info.port}/health`);
  logger.info(`   Roles:   http://localhost:${info.port}/api/roles`);
  logger.info(`   Analyze: POST http://localhost:${info.port}/api/analyze`);
  logger.info("═══════════════════════════════════════════════════");
});

function shutdown(signal: string): void {
  logger.info(`${signal} received — shutting down`);
  server.close(() => process.exit(0));
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGHUP", () => {
  service.reloadCatalogs();
  logger.info("SIGHUP received, catalogs will be re-read on next request");
});
