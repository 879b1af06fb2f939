import type { z } from "zod";
import { modelObject, requiredText } from "../../../common/validation/rules";
import {
  CUSTOMER_ADDRESS_MAX_LENGTH,
  CUSTOMER_NAME_MAX_LENGTH,
  CustomerMessages,
} from "../customers.const";

export const customerSchema = modelObject({
  name: requiredText(CustomerMessages.NAME_REQUIRED).max(
    CUSTOMER_NAME_MAX_LENGTH,
    CustomerMessages.NAME_TOO_LONG,
  ),
  email: requiredText(CustomerMessages.EMAIL_REQUIRED).email(CustomerMessages.EMAIL_INVALID),
  address: requiredText(CustomerMessages.ADDRESS_REQUIRED).max(
    CUSTOMER_ADDRESS_MAX_LENGTH,
    CustomerMessages.ADDRESS_TOO_LONG,
  ),
});

export type CustomerDto = z.infer<typeof customerSchema>;
