import { Module } from "@nestjs/common";
import { PaymentsController } from "./payments.controller";
import { PaymentsRepository } from "./payments.repository";
import { PaymentsService } from "./payments.service";
import { PaymentValidator } from "./payments.validator";

@Module({
  controllers: [PaymentsController],
  providers: [PaymentsService, PaymentsRepository, PaymentValidator],
})
export class PaymentsModule {}
