export interface SerializationOptions {
  indent?: number;
  /** -1 disables line folding */
  lineWidth?: number;
  noRefs?: boolean;
}

export interface BundleOptions extends SerializationOptions {
  /** Name the Secret `secrets.sops.yaml` so SOPS rules pick it up */
  sops?: boolean;
}
