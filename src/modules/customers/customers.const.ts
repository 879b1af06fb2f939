export const CUSTOMER_ENTITY = "Customer";

export const CUSTOMER_NAME_MAX_LENGTH = 100;
export const CUSTOMER_ADDRESS_MAX_LENGTH = 200;

export const CustomerMessages = {
  NAME_REQUIRED: "Name is required",
  NAME_TOO_LONG: `Name must not exceed ${CUSTOMER_NAME_MAX_LENGTH} characters`,
  EMAIL_REQUIRED: "Email is required",
  EMAIL_INVALID: "Email is invalid",
  ADDRESS_REQUIRED: "Address is required",
  ADDRESS_TOO_LONG: `Address must not exceed ${CUSTOMER_ADDRESS_MAX_LENGTH} characters`,
} as const;
