import { Injectable } from "@nestjs/common";
import { InMemoryRepository } from "../../common/data/in-memory.repository";
import type { PaymentDto } from "./dto/payments.dto";

@Injectable()
export class PaymentsRepository extends InMemoryRepository<PaymentDto> {}
