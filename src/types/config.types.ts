import { ResourceTimeouts } from './resource.types';

export interface AzureDevOpsConfig {
  readonly orgServiceUrl: string;
  readonly personalAccessToken: string;
  readonly project?: string | undefined;
  readonly apiVersion: string;
  readonly requestTimeoutMs: number;
}

export interface LoggerConfig {
  readonly level: 'error' | 'warn' | 'info' | 'debug';
  readonly filePath?: string | undefined;
  readonly enableConsole: boolean;
}

export interface AppConfig {
  readonly azureDevOps: AzureDevOpsConfig;
  readonly timeouts: ResourceTimeouts;
  readonly logger: LoggerConfig;
  readonly nodeEnv: 'development' | 'production' | 'test';
}
