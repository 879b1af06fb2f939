import { Injectable } from "@nestjs/common";
import { EntityService } from "../../common/services/entity.service";
import type { PaymentDto } from "./dto/payments.dto";
import { PAYMENT_ENTITY } from "./payments.const";
import { PaymentsRepository } from "./payments.repository";
import { PaymentValidator } from "./payments.validator";

@Injectable()
export class PaymentsService extends EntityService<PaymentDto> {
  constructor(paymentsRepository: PaymentsRepository, paymentValidator: PaymentValidator) {
    super(PAYMENT_ENTITY, paymentsRepository, paymentValidator);
  }
}
