export { DEFAULT_ROOT_PATH, DEFAULT_CONFIG_PATH } from "./defaults.js";
export {
  loadConfig,
  parseConfig,
  configFromEnv,
  type LoadConfigOptions,
} from "./loader.js";
export { resolveEndpointConfig, type EndpointConfig } from "./endpoint.js";
export { expandHomePath } from "./paths.js";
