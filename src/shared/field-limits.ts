/** Column sizes shared by the table definitions and input validation. */
export const FIELD_LIMITS = {
  userEmail: 254,
  itemIdentifier: 256,
  itemName: 2048,
  itemDescription: 4000,
  currency: 16,
  transactionId: 32,
  purchasedItemIdentifier: 256,
  paypalApiUrl: 4000,
  // numeric(8, 2)
  moneyPrecision: 8,
  // integer (int4): keys, object_id, quantity
  int4Max: 2_147_483_647,
} as const;
