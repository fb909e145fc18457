export { loadConfig, ConfigError } from "./config";
