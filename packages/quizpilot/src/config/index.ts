export { getEnv, parseEnv, resetEnvCache, type Env, type ProviderId } from './env.js';
export {
  loadModelCatalog,
  resolveRoleModel,
  AGENT_ROLES,
  type AgentRole,
  type LayeredModelSettings,
  type ModelSettings,
  type ModelCatalog,
  type ResolvedModel,
} from './models.js';
export { loadAppConfig, validateConfig, DEFAULT_RUN_CONFIG, type AppConfig, type BrowserConfig, type RunConfig } from './app.js';
