import { Injectable } from "@nestjs/common";
import { ModelValidator } from "../../common/validation/model-validator";
import { type OrderDto, orderSchema } from "./dto/orders.dto";

@Injectable()
export class OrderValidator extends ModelValidator<OrderDto> {
  constructor() {
    super(orderSchema);
  }
}
