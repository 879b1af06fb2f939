import { z } from "zod";
import { entityId, isoDateTime, modelObject, oneOf } from "../../../common/validation/rules";
import {
  PAYMENT_METHODS,
  PAYMENT_STATUSES,
  PAYMENT_TX_ID_MAX_LENGTH,
  PaymentMessages,
} from "../payments.const";

export const paymentSchema = modelObject({
  orderId: entityId(PaymentMessages.ORDER_ID_INVALID),
  amount: z
    .number({ error: PaymentMessages.AMOUNT_MUST_BE_GREATER_THAN_ZERO })
    .gt(0, PaymentMessages.AMOUNT_MUST_BE_GREATER_THAN_ZERO),
  status: oneOf("Status", PAYMENT_STATUSES),
  method: oneOf("Method", PAYMENT_METHODS),
  paymentDate: isoDateTime(PaymentMessages.PAYMENT_DATE_INVALID),
  txId: z
    .string({ error: PaymentMessages.TX_ID_INVALID })
    .max(PAYMENT_TX_ID_MAX_LENGTH, PaymentMessages.TX_ID_TOO_LONG)
    .nullish(),
});

export type PaymentDto = z.infer<typeof paymentSchema>;
