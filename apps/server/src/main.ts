import "reflect-metadata";
import { Logger, ValidationPipe } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";
import { loadConfig } from "./config";

async function bootstrap() {
  const config = loadConfig();
  const app = await NestFactory.create(AppModule, { logger: config.logLevels });
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }));
  await app.listen(config.port, config.host);
  Logger.log(`Listening on http://${config.host}:${config.port}`, "Bootstrap");
}

bootstrap().catch((e: unknown) => {
  Logger.error(e instanceof Error ? e.message : String(e), "Bootstrap");
  process.exit(1);
});
