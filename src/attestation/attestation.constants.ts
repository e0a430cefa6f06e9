export const ATTESTATION_GATEWAY = Symbol("ATTESTATION_GATEWAY");
