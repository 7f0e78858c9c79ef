/**
 * Configuration types
 *
 * A Configuration is the egg plus every operator choice. It is built once,
 * validated, frozen, and handed to the renderer.
 */

export type PortProtocol = 'TCP' | 'UDP';

export type AccessMode = 'ReadWriteOnce' | 'ReadOnlyMany' | 'ReadWriteMany' | 'ReadWriteOncePod';

export interface PvcSpec {
  readonly name: string;
  /** Storage quantity, e.g. `10Gi` */
  readonly size: string;
  readonly mountPath: string;
  readonly accessModes: readonly AccessMode[];
  readonly storageClassName?: string;
}

export interface EnvSelection {
  readonly key: string;
  readonly value: string;
  /** Routed to the Secret instead of the ConfigMap */
  readonly sensitive: boolean;
}

export interface PortSpec {
  readonly containerPort: number;
  readonly protocol: PortProtocol;
  readonly name: string;
}

export interface FileManagerConfig {
  readonly image: string;
  readonly username: string;
  readonly credential: string;
  readonly port: number;
}

export interface InstallConfig {
  readonly image: string;
  readonly entrypoint?: string;
  readonly script: string;
  /** Content fingerprint of `script`; see `versionHash` */
  readonly versionHash: string;
}

export interface ResourceValues {
  readonly requestsCpu?: string;
  readonly requestsMemory?: string;
  readonly limitsCpu?: string;
  readonly limitsMemory?: string;
}

export interface Configuration {
  readonly appName: string;
  readonly namespace: string;
  readonly image: string;
  readonly pvc: PvcSpec;
  readonly env: readonly EnvSelection[];
  readonly ports: readonly PortSpec[];
  readonly fileManager: FileManagerConfig;
  readonly startupCommand?: string;
  readonly install?: InstallConfig;
  readonly resources?: ResourceValues;
}
