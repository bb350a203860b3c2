import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { parse as parseIni } from 'ini';
import { z } from 'zod';
import { ArchiveConfig, ArchiveConfigInput, Credentials } from '../types';
import { CONFIG_FILE_CANDIDATES, defaultConfig, ENV_VARS } from './default';
import { ConfigError } from '../utils/errors';
import { logger, parseLogLevel } from '../utils/logger';

const optionalString = z.string().optional();

const iniFileSchema = z
  .object({
    s3: z.object({ access: optionalString, secret: optionalString }).passthrough().optional(),
    general: z
      .object({
        host: optionalString,
        s3_host: optionalString,
        secure: z.union([z.boolean(), z.string()]).optional(),
      })
      .passthrough()
      .optional(),
    logging: z.object({ level: optionalString }).passthrough().optional(),
  })
  .passthrough();

export interface ConfigManagerOptions {
  config?: ArchiveConfigInput;
  configFile?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolves the effective configuration. Later sources win, key by key:
 * defaults, environment, config file, explicit config.
 */
export class ConfigManager {
  private config: ArchiveConfig;
  private readonly explicit: ArchiveConfigInput;
  private readonly explicitFile?: string;
  private readonly env: NodeJS.ProcessEnv;
  private configFilePath?: string;

  constructor(options: ConfigManagerOptions = {}) {
    this.config = this.mergeConfigs(defaultConfig, {});
    this.explicit = options.config ?? {};
    this.explicitFile = options.configFile;
    this.env = options.env ?? process.env;
  }

  async loadConfig(): Promise<ArchiveConfig> {
    const fromEnv = this.readEnvironment();
    const filePath = await this.findConfigFile();
    const fromFile = filePath ? await this.readConfigFile(filePath) : {};

    this.configFilePath = filePath;
    this.config = [fromEnv, fromFile, this.explicit].reduce<ArchiveConfig>(
      (merged, layer) => this.mergeConfigs(merged, layer),
      defaultConfig
    );

    if (filePath) {
      logger.debug(`Loaded configuration from ${filePath}`);
    }
    return this.config;
  }

  getConfig(): ArchiveConfig {
    return this.config;
  }

  getConfigFilePath(): string | undefined {
    return this.configFilePath;
  }

  getCredentials(): Credentials {
    return { accessKey: this.config.s3.access, secretKey: this.config.s3.secret };
  }

  updateConfig(updates: ArchiveConfigInput): void {
    this.config = this.mergeConfigs(this.config, updates);
  }

  validateConfig(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { s3, general, logging } = this.config;

    if (s3.secret && !s3.access) {
      errors.push('S3 secret key is set without an access key');
    }
    if (s3.access && !s3.secret) {
      errors.push('S3 access key is set without a secret key');
    }
    if (!general.host || general.host.trim() === '') {
      errors.push('Host is required');
    }
    if (!general.s3Host || general.s3Host.trim() === '') {
      errors.push('S3 host is required');
    }
    if (logging.level !== undefined && parseLogLevel(logging.level) === undefined) {
      errors.push(`Unknown log level: ${logging.level}`);
    }

    return {
      valid: errors.length === 0,
      errors,
    };
  }

  private readEnvironment(): ArchiveConfigInput {
    const access = this.env[ENV_VARS.ACCESS_KEY];
    const secret = this.env[ENV_VARS.SECRET_KEY];
    return {
      s3: {
        access: access || undefined,
        secret: secret || undefined,
      },
    };
  }

  private async findConfigFile(): Promise<string | undefined> {
    const requested = this.explicitFile ?? this.env[ENV_VARS.CONFIG_FILE];
    if (requested) {
      if (!(await fs.pathExists(requested))) {
        throw new ConfigError(`Config file not found: ${requested}`);
      }
      return requested;
    }

    const home = this.env.HOME ?? os.homedir();
    for (const segments of CONFIG_FILE_CANDIDATES) {
      const candidate = path.join(home, ...segments);
      if (await fs.pathExists(candidate)) {
        return candidate;
      }
    }
    return undefined;
  }

  private async readConfigFile(filePath: string): Promise<ArchiveConfigInput> {
    const text = await fs.readFile(filePath, 'utf8');
    const result = iniFileSchema.safeParse(parseIni(text));
    if (!result.success) {
      const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
      throw new ConfigError(`Invalid config file ${filePath}: ${issues.join('; ')}`);
    }

    const { s3, general, logging } = result.data;
    const secure = general?.secure;
    return {
      s3: { access: s3?.access || undefined, secret: s3?.secret || undefined },
      general: {
        host: general?.host || undefined,
        s3Host: general?.s3_host || undefined,
        secure: typeof secure === 'string' ? secure.toLowerCase() !== 'false' : secure,
      },
      logging: { level: logging?.level || undefined },
    };
  }

  private mergeConfigs(base: ArchiveConfig, updates: ArchiveConfigInput): ArchiveConfig {
    return {
      s3: {
        access: updates.s3?.access ?? base.s3.access,
        secret: updates.s3?.secret ?? base.s3.secret,
      },
      general: {
        host: updates.general?.host ?? base.general.host,
        s3Host: updates.general?.s3Host ?? base.general.s3Host,
        secure: updates.general?.secure ?? base.general.secure,
      },
      logging: {
        level: updates.logging?.level ?? base.logging.level,
      },
    };
  }
}
