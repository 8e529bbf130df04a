// Config files
export {
  ConfigStore,
  ConfigError,
  configFormatFor,
  parseCompositionConfig,
  type ConfigErrorCode,
  type ConfigFormat,
} from "./config/ConfigStore";

// Render targets
export * from "./render";

// Interactive intake
export * from "./intake";
