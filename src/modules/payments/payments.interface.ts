import type { WithId } from "../../common/data/repository.interface";
import type { PaymentDto } from "./dto/payments.dto";

export type Payment = WithId<PaymentDto>;
