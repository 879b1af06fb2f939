export const SERVICE_NAME = "online-store-api";
