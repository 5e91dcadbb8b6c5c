/**
 * Validated application settings.
 */

export { AppConfigSchema, EmbeddingConfigSchema, GeneratorConfigSchema } from './schema.js'
export type { AppConfig, AppConfigInput } from './schema.js'
export { parseConfig, loadConfigFromEnv } from './env.js'
