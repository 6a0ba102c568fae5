export interface SignatureRecord {
  /** `tag@digest` reference the signature was requested for. */
  readonly reference: string;
  readonly ok: boolean;
  readonly error?: string;
}

export interface SignerTools {
  /** Signer CLI, `cosign` unless configured otherwise. */
  readonly cosign: string;
}
