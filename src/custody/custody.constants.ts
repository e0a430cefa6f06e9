export const CUSTODY_LEDGER = Symbol("CUSTODY_LEDGER");
