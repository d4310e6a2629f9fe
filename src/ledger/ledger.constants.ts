export const CUSTODY_LEDGER = "CUSTODY_LEDGER";
