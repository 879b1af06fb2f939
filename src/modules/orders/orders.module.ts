import { Module } from "@nestjs/common";
import { OrdersController } from "./orders.controller";
import { OrdersRepository } from "./orders.repository";
import { OrdersService } from "./orders.service";
import { OrderValidator } from "./orders.validator";

@Module({
  controllers: [OrdersController],
  providers: [OrdersService, OrdersRepository, OrderValidator],
})
export class OrdersModule {}
