/**
 * Config barrel exports
 */

export { loadMonitorConfig, ConfigError } from "./monitorConfig";
