export {
  CONFIG_ENV_VAR,
  loadConfig,
  loadConfigOrDefaults,
  resolveConfigPath,
  type ConfigLoadResult,
} from "./loader";
export { MediaSelectConfigSchema, type MediaSelectConfig } from "./schema";
