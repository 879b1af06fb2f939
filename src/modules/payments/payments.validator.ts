import { Injectable } from "@nestjs/common";
import { ModelValidator } from "../../common/validation/model-validator";
import { type PaymentDto, paymentSchema } from "./dto/payments.dto";

@Injectable()
export class PaymentValidator extends ModelValidator<PaymentDto> {
  constructor() {
    super(paymentSchema);
  }
}
