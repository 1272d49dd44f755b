import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import {
  ConfigError,
  HarnessConfigSchema,
  formatIssues,
  isRecord,
  type HarnessConfig,
} from '@patchproof/shared';

type ConfigTree = Record<string, unknown>;

export interface ConfigOptions {
  configPath?: string; // --config
  flags?: ConfigTree; // CLI flags, shaped like the config file
  cwd?: string; // project config lives here
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

interface EnvBinding {
  name: string;
  path: [string, string];
  parse: 'int' | 'number' | 'string';
}

const ENV_BINDINGS: EnvBinding[] = [
  { name: 'PATCHPROOF_MAX_WORKERS', path: ['run', 'maxWorkers'], parse: 'int' },
  { name: 'PATCHPROOF_MAX_RETRIES', path: ['retry', 'maxAttempts'], parse: 'int' },
  { name: 'PATCHPROOF_TIMEOUT_MULTIPLIER', path: ['timeouts', 'multiplier'], parse: 'number' },
  { name: 'PATCHPROOF_OUTPUT_DIR', path: ['run', 'outputDir'], parse: 'string' },
];

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigTree {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`);
      }
      throw error;
    }
    if (parsed === undefined || parsed === null) return {};
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  /**
   * Deep-merges `source` over `target`. Arrays and primitives replace; `undefined` is ignored.
   */
  static mergeConfigs(target: ConfigTree, source: ConfigTree): ConfigTree {
    const output: ConfigTree = { ...target };
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) continue;
      const targetValue = output[key];
      output[key] =
        isRecord(sourceValue) && isRecord(targetValue)
          ? this.mergeConfigs(targetValue, sourceValue)
          : sourceValue;
    }
    return output;
  }

  static fromEnv(env: NodeJS.ProcessEnv): ConfigTree {
    let tree: ConfigTree = {};
    for (const binding of ENV_BINDINGS) {
      const raw = env[binding.name];
      if (raw === undefined || raw === '') continue;

      let value: string | number = raw;
      if (binding.parse !== 'string') {
        value = Number(raw);
        if (!Number.isFinite(value) || (binding.parse === 'int' && !Number.isInteger(value))) {
          throw new ConfigError(`${binding.name} must be ${binding.parse === 'int' ? 'an integer' : 'a number'}, got "${raw}"`);
        }
      }
      const [section, key] = binding.path;
      tree = this.mergeConfigs(tree, { [section]: { [key]: value } });
    }
    return tree;
  }

  static writeEffectiveConfig(config: HarnessConfig, dir: string): string {
    fs.mkdirSync(dir, { recursive: true });
    const filePath = path.join(dir, 'effective-config.json');
    fs.writeFileSync(filePath, JSON.stringify(config, null, 2), 'utf8');
    return filePath;
  }

  static load(options: ConfigOptions = {}): HarnessConfig {
    const cwd = options.cwd ?? process.cwd();
    const env = options.env ?? process.env;
    const homeDir = options.homeDir ?? os.homedir();

    // 1. User config: ~/.patchproof/config.yaml
    const userConfig = this.loadYaml(path.join(homeDir, '.patchproof', 'config.yaml'));

    // 2. Project config: <cwd>/.patchproof.yaml
    const projectConfig = this.loadYaml(path.join(cwd, '.patchproof.yaml'));

    // 3. Explicit --config file
    let explicitConfig: ConfigTree = {};
    if (options.configPath) {
      const resolved = path.resolve(cwd, options.configPath);
      if (!fs.existsSync(resolved)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(resolved);
    }

    // Precedence: flags > env > explicit > project > user > defaults
    const merged = [projectConfig, explicitConfig, this.fromEnv(env), options.flags ?? {}].reduce(
      (acc, layer) => this.mergeConfigs(acc, layer),
      userConfig,
    );

    const result = HarnessConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = formatIssues(result.error)
        .split('\n')
        .map((line) => `- ${line}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }
    return result.data;
  }
}
