import { AppConfig } from './config/app-config';
import { AzureDevOpsApiClient } from './services/azure-devops/azure-devops-api-client';
import { PushRetryOptions } from './services/git/push-retry';
import { Logger } from './services/logger';
import { GitRepositoryBranchResource } from './services/resources/git-repository-branch.resource';
import { GitRepositoryFileResource } from './services/resources/git-repository-file.resource';
import { GitClient, LoggerConfig } from './types';

export interface GitResourceProviderDependencies {
  readonly client?: GitClient;
  readonly logger?: Logger;
  readonly retryOptions?: PushRetryOptions;
}

/**
 * 설정으로부터 클라이언트와 두 리소스를 구성하는 진입점
 * 모든 리소스는 같은 GitClient를 주입받음
 */
export class GitResourceProvider {
  readonly branches: GitRepositoryBranchResource;
  readonly files: GitRepositoryFileResource;
  private readonly logger: Logger;

  constructor(
    readonly config: AppConfig,
    dependencies: GitResourceProviderDependencies = {}
  ) {
    this.logger = dependencies.logger || GitResourceProvider.createLogger(config.logger);
    const client = dependencies.client || new AzureDevOpsApiClient(config.azureDevOps, this.logger);

    this.branches = new GitRepositoryBranchResource({ client, logger: this.logger });
    this.files = new GitRepositoryFileResource({
      client,
      logger: this.logger,
      timeouts: config.timeouts,
      retryOptions: dependencies.retryOptions
    });
  }

  static createLogger(config: LoggerConfig): Logger {
    return new Logger({
      level: Logger.parseLevel(config.level),
      filePath: config.filePath,
      enableConsole: config.enableConsole
    });
  }

  async shutdown(): Promise<void> {
    await this.logger.flush();
  }
}
