import type { INestApplication } from "@nestjs/common";
import { Test, type TestingModuleBuilder } from "@nestjs/testing";
import { AppModule } from "../src/app.module";
import { configureApplication } from "../src/app.setup";

/**
 * Boots the full application in process, wired exactly as in production.
 * `customize` can override providers before the module is compiled.
 *
 * @example
 * ```typescript
 * app = await createTestApp((builder) =>
 *   builder.overrideProvider(CustomersRepository).useValue(failingRepository),
 * );
 * ```
 */
export async function createTestApp(
  customize: (builder: TestingModuleBuilder) => TestingModuleBuilder = (builder) => builder,
): Promise<INestApplication> {
  const moduleFixture = await customize(
    Test.createTestingModule({
      imports: [AppModule],
    }),
  ).compile();

  const app = moduleFixture.createNestApplication({
    logger: false,
  });
  configureApplication(app);
  await app.init();

  return app;
}

export const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

/** A well-formed identifier that no seeded record uses. */
export const UNKNOWN_ID = "00000000-0000-4000-8000-000000000000";
