/**
 * Manifest set assembly
 */

import type {
  Configuration,
  KubernetesManifest,
  KustomizationDocument,
  ManifestSet,
  RenderedManifest,
} from '../types/index.js';
import { renderConfigMap, renderSecret } from './config.js';
import { configMapData, secretData } from './environment.js';
import { renderInstallerConfigMap, renderInstallerJob } from './installer.js';
import { MANIFEST_FILES, ownershipLabels } from './names.js';
import { renderFileManagerService, renderService } from './networking.js';
import { renderFileManagerConfigPvc, renderNamespace, renderPvc } from './storage.js';
import { renderDeployment, renderFileManagerDeployment } from './workloads.js';

/**
 * Render the complete manifest set for a configuration.
 *
 * Output order is fixed: namespace, pvc, file-manager config pvc, configmap
 * (when it has data), secret, installer configmap and job (when an installer
 * is configured), deployment, file-manager deployment, service (when ports
 * exist), file-manager service.
 *
 * The configuration is assumed valid; nothing is checked here. The function
 * performs no I/O, logging included, and returns fresh objects on every call.
 *
 * @param secretFilename - filename for the Secret, e.g. `secrets.sops.yaml`
 */
export function renderAll(
  config: Configuration,
  secretFilename: string = MANIFEST_FILES.secret
): ManifestSet {
  const manifests: RenderedManifest[] = [];
  const add = (filename: string, manifest: KubernetesManifest): void => {
    manifests.push({ filename, manifest });
  };

  add(MANIFEST_FILES.namespace, renderNamespace(config));
  add(MANIFEST_FILES.pvc, renderPvc(config));
  add(MANIFEST_FILES.fileManagerConfigPvc, renderFileManagerConfigPvc(config));

  const data = configMapData(config);
  if (Object.keys(data).length > 0) {
    add(MANIFEST_FILES.configMap, renderConfigMap(config, data));
  }
  add(secretFilename, renderSecret(config, secretData(config)));

  if (config.install) {
    add(MANIFEST_FILES.installerConfigMap, renderInstallerConfigMap(config, config.install));
    add(MANIFEST_FILES.installerJob, renderInstallerJob(config, config.install));
  }

  add(MANIFEST_FILES.deployment, renderDeployment(config));
  add(MANIFEST_FILES.fileManagerDeployment, renderFileManagerDeployment(config));
  if (config.ports.length > 0) {
    add(MANIFEST_FILES.service, renderService(config));
  }
  add(MANIFEST_FILES.fileManagerService, renderFileManagerService(config));

  return manifests;
}

/**
 * Kustomization listing exactly the given files, labelled with the ownership
 * pair.
 */
export function renderKustomization(
  config: Configuration,
  filenames: readonly string[]
): KustomizationDocument {
  return {
    apiVersion: 'kustomize.config.k8s.io/v1beta1',
    kind: 'Kustomization',
    resources: [...filenames],
    labels: [{ pairs: ownershipLabels(config.appName) }],
  };
}

export function findManifest(
  manifests: ManifestSet,
  filename: string
): KubernetesManifest | undefined {
  return manifests.find((entry) => entry.filename === filename)?.manifest;
}
