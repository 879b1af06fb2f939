export const PAYMENT_ENTITY = "Payment";

export const PAYMENT_STATUSES = [
  "Pending",
  "Processing",
  "Completed",
  "Failed",
  "Refunded",
  "Cancelled",
] as const;

export const PAYMENT_METHODS = [
  "CreditCard",
  "DebitCard",
  "PayPal",
  "BankTransfer",
  "Cryptocurrency",
] as const;

export const PAYMENT_TX_ID_MAX_LENGTH = 100;

export const PaymentMessages = {
  ORDER_ID_INVALID: "Order ID must be a valid identifier",
  AMOUNT_MUST_BE_GREATER_THAN_ZERO: "Amount must be greater than 0",
  PAYMENT_DATE_INVALID: "Payment date must be a valid ISO-8601 date-time",
  TX_ID_INVALID: `Transaction ID must be text of at most ${PAYMENT_TX_ID_MAX_LENGTH} characters`,
  TX_ID_TOO_LONG: `Transaction ID must not exceed ${PAYMENT_TX_ID_MAX_LENGTH} characters`,
} as const;
