export {
  EngineConfigSchema,
  RegistryConfigSchema,
  loadEngineConfig,
  defaultConcurrency,
  type EngineConfig,
} from "./config";
