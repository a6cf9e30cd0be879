/**
 * Payment states reported by the gateway flow. The strings are stored as-is
 * in the `payment_status` enum and must not change.
 */
export const PAYMENT_STATUSES = [
  "checkout",
  "pending",
  "completed",
  "canceled",
] as const;

export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export function isPaymentStatus(value: unknown): value is PaymentStatus {
  return (
    typeof value === "string" &&
    PAYMENT_STATUSES.some((status) => status === value)
  );
}
