import "reflect-metadata";
import "./tracing";
import { Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";
import { configureApplication } from "./app.setup";
import type { EnvConfig } from "./config/env.config";

async function bootstrap() {
  const logger = new Logger("Bootstrap");

  try {
    logger.log("Starting application...");

    const app = configureApplication(await NestFactory.create(AppModule));

    const configService = app.get(ConfigService);
    const port = configService.get<EnvConfig["PORT"]>("PORT", 3000);
    const host = configService.get<EnvConfig["HOST"]>("HOST", "0.0.0.0");
    const nodeEnv = configService.get<EnvConfig["NODE_ENV"]>("NODE_ENV", "production");

    await app.listen(port, host);

    logger.log(`Application started successfully on ${host}:${port} (${nodeEnv})`);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error(`Failed to start application: ${errorMessage}`);
    process.exit(1);
  }
}

void bootstrap();
