import fs from 'fs';
import { AppConfig, DEFAULT_RESOURCE_TIMEOUTS, LoggerConfig } from '../types';

export type { AppConfig } from '../types';

export interface AppEnvironment {
  readonly NODE_ENV?: string;
  readonly AZDO_ORG_SERVICE_URL?: string;
  readonly AZDO_PERSONAL_ACCESS_TOKEN?: string;
  readonly AZDO_PROJECT?: string;
  readonly AZDO_API_VERSION?: string;
  readonly AZDO_REQUEST_TIMEOUT_MS?: string;
  readonly AZDO_CREATE_TIMEOUT_MS?: string;
  readonly AZDO_UPDATE_TIMEOUT_MS?: string;
  readonly AZDO_DELETE_TIMEOUT_MS?: string;
  readonly LOG_LEVEL?: string;
  readonly LOG_FILE?: string;
}

export type PartialAppConfig = {
  readonly [K in keyof AppConfig]?: AppConfig[K] extends object ? Partial<AppConfig[K]> : AppConfig[K];
};

const LOG_LEVELS: ReadonlyArray<LoggerConfig['level']> = ['error', 'warn', 'info', 'debug'];

export class AppConfigLoader {
  static loadFromEnvironment(env: AppEnvironment = process.env): AppConfig {
    const nodeEnv = this.parseNodeEnv(env.NODE_ENV);
    const createTimeoutMs = this.parseNumber(env.AZDO_CREATE_TIMEOUT_MS) ?? DEFAULT_RESOURCE_TIMEOUTS.create;

    return {
      nodeEnv,
      azureDevOps: {
        orgServiceUrl: env.AZDO_ORG_SERVICE_URL || '',
        personalAccessToken: env.AZDO_PERSONAL_ACCESS_TOKEN || '',
        project: env.AZDO_PROJECT || undefined,
        apiVersion: env.AZDO_API_VERSION || '7.1',
        requestTimeoutMs: this.parseNumber(env.AZDO_REQUEST_TIMEOUT_MS) ?? 30000
      },
      timeouts: {
        create: createTimeoutMs,
        // update/delete는 별도 설정이 없으면 create timeout을 따름
        update: this.parseNumber(env.AZDO_UPDATE_TIMEOUT_MS),
        delete: this.parseNumber(env.AZDO_DELETE_TIMEOUT_MS)
      },
      logger: {
        level: this.parseLogLevel(env.LOG_LEVEL),
        filePath: env.LOG_FILE || undefined,
        enableConsole: nodeEnv !== 'test'
      }
    };
  }

  /**
   * JSON 설정 파일을 환경변수 기본값 위에 병합
   */
  static loadFromFile(configPath: string, env: AppEnvironment = process.env): AppConfig {
    const defaults = this.loadFromEnvironment(env);
    if (!fs.existsSync(configPath)) {
      return defaults;
    }

    const parsed: PartialAppConfig | null = JSON.parse(fs.readFileSync(configPath, 'utf8'));
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error(`Configuration file ${configPath} must contain a JSON object`);
    }
    return this.mergeWithDefaults(parsed, defaults);
  }

  static mergeWithDefaults(partialConfig: PartialAppConfig, defaults: AppConfig): AppConfig {
    return {
      nodeEnv: partialConfig.nodeEnv || defaults.nodeEnv,
      azureDevOps: { ...defaults.azureDevOps, ...partialConfig.azureDevOps },
      timeouts: { ...defaults.timeouts, ...partialConfig.timeouts },
      logger: { ...defaults.logger, ...partialConfig.logger }
    };
  }

  static validate(config: AppConfig): void {
    const errors: string[] = [];

    if (!config.azureDevOps.orgServiceUrl) {
      errors.push('azureDevOps.orgServiceUrl is required (AZDO_ORG_SERVICE_URL)');
    } else if (!/^https?:\/\//.test(config.azureDevOps.orgServiceUrl)) {
      errors.push('azureDevOps.orgServiceUrl must be an http(s) URL');
    }

    if (!config.azureDevOps.personalAccessToken) {
      errors.push('azureDevOps.personalAccessToken is required (AZDO_PERSONAL_ACCESS_TOKEN)');
    }

    if (config.azureDevOps.requestTimeoutMs <= 0) {
      errors.push('azureDevOps.requestTimeoutMs must be positive');
    }

    for (const [operation, timeout] of Object.entries(config.timeouts)) {
      if (timeout !== undefined && (typeof timeout !== 'number' || timeout <= 0)) {
        errors.push(`timeouts.${operation} must be a positive number of milliseconds`);
      }
    }

    if (!LOG_LEVELS.includes(config.logger.level)) {
      errors.push(`logger.level must be one of ${LOG_LEVELS.join(', ')}`);
    }

    if (errors.length > 0) {
      throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
    }
  }

  private static parseNodeEnv(value: string | undefined): AppConfig['nodeEnv'] {
    return value === 'production' || value === 'test' ? value : 'development';
  }

  private static parseLogLevel(value: string | undefined): LoggerConfig['level'] {
    const level = LOG_LEVELS.find(candidate => candidate === (value || '').toLowerCase());
    return level ?? 'info';
  }

  private static parseNumber(value: string | undefined): number | undefined {
    if (value === undefined || value.trim() === '') {
      return undefined;
    }
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
}
