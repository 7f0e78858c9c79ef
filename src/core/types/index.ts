export type {
  AccessMode,
  Configuration,
  EnvSelection,
  FileManagerConfig,
  InstallConfig,
  PortProtocol,
  PortSpec,
  PvcSpec,
  ResourceValues,
} from './configuration.js';
export type { EggDescriptor, EggDescriptorJson, EggVariable, EggVariableJson } from './egg.js';
export type {
  KubernetesManifest,
  KustomizationDocument,
  ManifestSet,
  RenderedFile,
  RenderedManifest,
} from './manifest.js';
