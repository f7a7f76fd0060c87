export {
  ConfigLoader,
  CONFIG_FILE_NAMES,
  type ResolveConfigOptions,
  type ResolvedConfig,
} from './loader.js';
export { validateConfig, type PartialSiteConfig } from './validator.js';
