/** Library entry point: the startup sequence and its building blocks. */
export { makeCli } from './cli';
export type { CliDeps } from './cli/context';
export { type ContainerEnv, loadContainerEnv } from './runner/contenv';
export * from './runner/errors';
export * from './runner/log/logger';
export * from './runner/options/accessor';
export * from './runner/options/source';
export { loadSettings } from './runner/settings/load';
export type { LauncherSettings } from './runner/settings/schema';
export * from './runner/startup';
export { launchServer, toExitStatus } from './runner/startup/launch';
export {
  buildChildEnv,
  OPTION_ENV_MAP,
  renderExports,
  resolveStartupValues,
} from './runner/startup/values';
