import type { INestApplication } from "@nestjs/common";
import { HttpAdapterHost } from "@nestjs/core";
import { ErrorMapper } from "./common/errors/error-mapper";
import { GlobalExceptionFilter } from "./common/filters/global-exception.filter";

/**
 * Applies the application-wide wiring that lives outside the module graph.
 * Shared by bootstrap and the e2e tests.
 */
export function configureApplication(app: INestApplication): INestApplication {
  const httpAdapterHost = app.get(HttpAdapterHost);
  app.useGlobalFilters(new GlobalExceptionFilter(httpAdapterHost, app.get(ErrorMapper)));
  app.enableShutdownHooks();
  return app;
}
