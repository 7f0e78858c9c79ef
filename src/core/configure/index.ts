export {
  configure,
  type ConfigureOptions,
  DEFAULT_APP_NAME,
  DEFAULT_MOUNT_PATH,
  FILE_MANAGER_DEFAULT_PORT,
  FILE_MANAGER_DEFAULT_USERNAME,
  FILE_MANAGER_IMAGE,
  promptEnvVars,
  promptFileManager,
  promptIdentity,
  promptImage,
  promptInstall,
  promptMissingStartupVars,
  promptPorts,
  promptPvc,
  promptResources,
  promptStartup,
} from './configure.js';
export {
  type EnvPorts,
  FORCE_SECRET_VARS,
  isForcedSecret,
  isSensitiveDefault,
  missingStartupVars,
  portsFromEnv,
} from './env.js';
export { type AskOptions, askValid, type Prompter, ReadlinePrompter } from './prompter.js';
