/**
 * Parsed egg descriptor types
 */

/**
 * One operator-facing variable declared by an egg
 */
export interface EggVariable {
  /** Display name; falls back to the environment variable name */
  readonly name: string;
  readonly envVariable?: string;
  readonly description?: string;
  readonly defaultValue?: string;
  readonly required: boolean;
}

/**
 * Normalized view of an egg document, independent of which key spelling the
 * author used.
 */
export interface EggDescriptor {
  readonly name?: string;
  readonly description?: string;
  /** Startup command template with `{{VAR}}` placeholders */
  readonly startup?: string;
  /** Image label to image reference, in document order */
  readonly dockerImages: ReadonlyMap<string, string>;
  readonly variables: readonly EggVariable[];
  /** Unique ports in 1-65535, ascending */
  readonly ports: readonly number[];
  /** Present together with `installImage` or not at all */
  readonly installScript?: string;
  readonly installImage?: string;
  readonly installEntrypoint?: string;
}

/**
 * Canonical JSON spelling of a variable, as served over HTTP
 */
export interface EggVariableJson {
  name: string;
  env_variable: string | null;
  description: string | null;
  default_value: string | null;
  required: boolean;
}

/**
 * Canonical JSON spelling of a descriptor, as served over HTTP
 */
export interface EggDescriptorJson {
  name: string | null;
  description: string | null;
  startup: string | null;
  docker_images: Record<string, string>;
  variables: EggVariableJson[];
  ports: number[];
  install_script: string | null;
  install_image: string | null;
  install_entrypoint: string | null;
}
