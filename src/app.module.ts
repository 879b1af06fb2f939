import { type MiddlewareConsumer, Module, type NestModule } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { RequestIdMiddleware } from "./common/middlewares/request-id.middleware";
import { ErrorMapper } from "./common/errors/error-mapper";
import { type EnvConfig, exposesInternalErrors, validateEnvironment } from "./config/env.config";
import { CatalogModule } from "./modules/catalog/catalog.module";
import { ProductsController } from "./modules/catalog/products.controller";
import { CustomersController } from "./modules/customers/customers.controller";
import { CustomersModule } from "./modules/customers/customers.module";
import { HealthModule } from "./modules/health/health.module";
import { OrdersController } from "./modules/orders/orders.controller";
import { OrdersModule } from "./modules/orders/orders.module";
import { PaymentsController } from "./modules/payments/payments.controller";
import { PaymentsModule } from "./modules/payments/payments.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    CatalogModule,
    CustomersModule,
    OrdersModule,
    PaymentsModule,
    HealthModule,
  ],
  providers: [
    {
      provide: ErrorMapper,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<EnvConfig, true>) =>
        new ErrorMapper({
          exposeInternalErrors: exposesInternalErrors(configService.get("NODE_ENV", { infer: true })),
        }),
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer
      .apply(RequestIdMiddleware)
      .forRoutes(ProductsController, CustomersController, OrdersController, PaymentsController);
  }
}
