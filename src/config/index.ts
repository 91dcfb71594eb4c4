/**
 * @fileoverview devenv configuration
 *
 * - `schema`: zod schemas and the resolved DevenvConfig type
 * - `defaults`: built-in values used when no config file is present
 * - `loader`: file lookup, YAML parsing, validation and `~` expansion
 */

export {
  DevenvConfigSchema,
  DevenvConfigFileSchema,
  type DevenvConfig,
  type DevenvConfigFile,
} from './schema.js';

export {
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_RELATIVE_PATH,
  DEFAULT_ROLES,
  DEFAULT_OPTIONAL_TOOLS,
} from './defaults.js';

export {
  loadConfig,
  parseConfigText,
  resolveConfig,
  expandHome,
  type LoadConfigOptions,
  type LoadedConfig,
} from './loader.js';
