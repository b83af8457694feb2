import { logger } from "./src/utils/logger";
import { GymCatalogApplication } from "./src/main";
import { createServer } from "./src/server";

async function bootstrap() {
  const application = new GymCatalogApplication();
  await application.initialize();

  const app = createServer(application);
  const port = application.config.port;
  app.listen(port, () => logger.info({ port }, "Gym partner catalog started"));
}

bootstrap().catch((error: unknown) => {
  logger.error({ err: error }, "Failed to initialize application");
  process.exit(1);
});
