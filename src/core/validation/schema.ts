/**
 * Arktype shape of a Configuration
 *
 * Structure and primitive ranges only; relationships between fields are
 * checked in `configuration.ts`.
 */

import { type } from 'arktype';

const port = type('1 <= number.integer <= 65535');

export const envSelectionSchema = type({
  key: 'string > 0',
  value: 'string',
  sensitive: 'boolean',
});

export const portSpecSchema = type({
  containerPort: port,
  protocol: "'TCP' | 'UDP'",
  name: 'string > 0',
});

export const pvcSpecSchema = type({
  name: 'string > 0',
  size: 'string > 0',
  mountPath: 'string > 0',
  accessModes: type("'ReadWriteOnce' | 'ReadOnlyMany' | 'ReadWriteMany' | 'ReadWriteOncePod'").array().atLeastLength(1),
  'storageClassName?': 'string | undefined',
});

export const fileManagerSchema = type({
  image: 'string > 0',
  username: 'string > 0',
  credential: 'string > 0',
  port,
});

export const installSchema = type({
  image: 'string > 0',
  'entrypoint?': 'string | undefined',
  script: 'string > 0',
  versionHash: 'string',
});

export const resourceValuesSchema = type({
  'requestsCpu?': 'string | undefined',
  'requestsMemory?': 'string | undefined',
  'limitsCpu?': 'string | undefined',
  'limitsMemory?': 'string | undefined',
});

export const configurationSchema = type({
  appName: 'string',
  namespace: 'string',
  image: 'string > 0',
  pvc: pvcSpecSchema,
  env: envSelectionSchema.array(),
  ports: portSpecSchema.array(),
  fileManager: fileManagerSchema,
  'startupCommand?': 'string | undefined',
  'install?': installSchema.or('undefined'),
  'resources?': resourceValuesSchema.or('undefined'),
});
