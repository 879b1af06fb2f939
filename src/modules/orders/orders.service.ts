import { Injectable } from "@nestjs/common";
import { EntityService } from "../../common/services/entity.service";
import type { OrderDto } from "./dto/orders.dto";
import { ORDER_ENTITY } from "./orders.const";
import { OrdersRepository } from "./orders.repository";
import { OrderValidator } from "./orders.validator";

@Injectable()
export class OrdersService extends EntityService<OrderDto> {
  constructor(ordersRepository: OrdersRepository, orderValidator: OrderValidator) {
    super(ORDER_ENTITY, ordersRepository, orderValidator);
  }
}
