export {
  signReleaseTargets,
  signatureReference,
  warnOnMissingIdentity,
} from "./keyless-signer.js";
export type { SignatureRecord, SignerTools } from "./types.js";
