import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import {
  ConfigError,
  PipelineConfigSchema,
  type PipelineConfig,
  type PipelineConfigInput,
} from '@codecorpus/shared';

export const USER_CONFIG_PATH = path.join('.codecorpus', 'config.yaml');
export const PROJECT_CONFIG_FILE = 'codecorpus.yaml';

export interface ConfigOptions {
  configPath?: string; // --config
  flags?: PipelineConfigInput; // CLI flags
  cwd?: string; // where codecorpus.yaml is looked up
  homeDir?: string;
}

type ConfigLayer = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigLayer {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(target: ConfigLayer, source: ConfigLayer): ConfigLayer {
    const output: ConfigLayer = { ...target };

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  static load(options: ConfigOptions = {}): PipelineConfig {
    const cwd = options.cwd || process.cwd();
    const homeDir = options.homeDir || os.homedir();

    // 1. User config: ~/.codecorpus/config.yaml
    const userConfig = this.loadYaml(path.join(homeDir, USER_CONFIG_PATH));

    // 2. Project config: <cwd>/codecorpus.yaml
    const projectConfig = this.loadYaml(path.join(cwd, PROJECT_CONFIG_FILE));

    // 3. Explicit --config file (if provided)
    let explicitConfig: ConfigLayer = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // Precedence: flags > explicit > project > user > schema defaults
    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, projectConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, options.flags ?? {});

    const result = PipelineConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`, {
        details: { issues: result.error.issues.map((i) => i.path.join('.')) },
      });
    }
    return result.data;
  }
}
