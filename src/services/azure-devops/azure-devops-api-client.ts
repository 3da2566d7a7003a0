import axios, { AxiosInstance, AxiosResponse } from 'axios';
import {
  AzureDevOpsConfig,
  GetCommitsOptions,
  GetItemOptions,
  GetRefsOptions,
  GitBranchStats,
  GitClient,
  GitCommitRef,
  GitItem,
  GitPush,
  GitPushResult,
  GitRef,
  GitRefUpdate,
  GitRefUpdateResult
} from '../../types';
import { Logger } from '../logger';
import { AzureDevOpsApiError, AzureDevOpsErrorBody } from './types';

interface ListResponse<T> {
  readonly count?: number;
  readonly value?: T[];
}

type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Azure DevOps Git REST API client wrapper
 * 저장소는 GUID로 지정하므로 project는 선택 사항
 */
export class AzureDevOpsApiClient implements GitClient {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(
    private readonly config: AzureDevOpsConfig,
    logger?: Logger,
    http?: AxiosInstance
  ) {
    this.logger = logger || Logger.createConsoleLogger();
    this.http = http || axios.create({
      baseURL: AzureDevOpsApiClient.buildBaseUrl(config),
      timeout: config.requestTimeoutMs,
      // PAT 인증: 사용자 이름은 비워둠
      auth: {
        username: '',
        password: config.personalAccessToken
      },
      headers: {
        'Accept': 'application/json',
        'Content-Type': 'application/json'
      }
    });
  }

  static buildBaseUrl(config: Pick<AzureDevOpsConfig, 'orgServiceUrl' | 'project'>): string {
    const orgUrl = config.orgServiceUrl.replace(/\/+$/, '');
    return config.project ? `${orgUrl}/${encodeURIComponent(config.project)}` : orgUrl;
  }

  /**
   * Get statistics (head commit, default flag) of a single branch
   */
  async getBranch(repositoryId: string, name: string): Promise<GitBranchStats> {
    return this.send('Failed to get branch', () =>
      this.http.get<GitBranchStats>(this.repositoryPath(repositoryId, 'stats/branches'), {
        params: this.params({ name })
      })
    );
  }

  /**
   * List refs whose name starts with the filter
   */
  async getRefs(repositoryId: string, options: GetRefsOptions): Promise<ReadonlyArray<GitRef>> {
    const response = await this.send('Failed to get refs', () =>
      this.http.get<ListResponse<GitRef>>(this.repositoryPath(repositoryId, 'refs'), {
        params: this.params({
          filter: options.filter,
          $top: options.top,
          peelTags: options.peelTags
        })
      })
    );
    return response.value ?? [];
  }

  /**
   * Create, update or delete refs (compare-and-swap on oldObjectId)
   */
  async updateRefs(repositoryId: string, refUpdates: ReadonlyArray<GitRefUpdate>): Promise<ReadonlyArray<GitRefUpdateResult>> {
    const response = await this.send('Failed to update refs', () =>
      this.http.post<ListResponse<GitRefUpdateResult>>(this.repositoryPath(repositoryId, 'refs'), refUpdates, {
        params: this.params({})
      })
    );
    return response.value ?? [];
  }

  /**
   * Get item metadata, optionally with its content
   */
  async getItem(repositoryId: string, options: GetItemOptions): Promise<GitItem> {
    return this.send('Failed to get item', () =>
      this.http.get<GitItem>(this.repositoryPath(repositoryId, 'items'), {
        params: this.params({
          path: options.path,
          includeContent: options.includeContent,
          'versionDescriptor.version': options.versionDescriptor?.version,
          'versionDescriptor.versionType': options.versionDescriptor?.versionType,
          $format: 'json'
        })
      })
    );
  }

  /**
   * List commits, newest first
   */
  async getCommits(repositoryId: string, options: GetCommitsOptions): Promise<ReadonlyArray<GitCommitRef>> {
    const response = await this.send('Failed to get commits', () =>
      this.http.get<ListResponse<GitCommitRef>>(this.repositoryPath(repositoryId, 'commits'), {
        params: this.params({
          'searchCriteria.$top': options.top,
          'searchCriteria.itemVersion.version': options.itemVersion?.version,
          'searchCriteria.itemVersion.versionType': options.itemVersion?.versionType
        })
      })
    );
    return response.value ?? [];
  }

  async getCommit(repositoryId: string, commitId: string): Promise<GitCommitRef> {
    return this.send('Failed to get commit', () =>
      this.http.get<GitCommitRef>(this.repositoryPath(repositoryId, `commits/${encodeURIComponent(commitId)}`), {
        params: this.params({})
      })
    );
  }

  /**
   * Push commits and ref updates as one atomic unit
   */
  async createPush(repositoryId: string, push: GitPush): Promise<GitPushResult> {
    return this.send('Failed to create push', () =>
      this.http.post<GitPushResult>(this.repositoryPath(repositoryId, 'pushes'), push, {
        params: this.params({})
      })
    );
  }

  private repositoryPath(repositoryId: string, resource: string): string {
    return `/_apis/git/repositories/${encodeURIComponent(repositoryId)}/${resource}`;
  }

  private params(query: QueryParams): QueryParams {
    const params: QueryParams = { 'api-version': this.config.apiVersion };
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        params[key] = value;
      }
    }
    return params;
  }

  private async send<T>(message: string, call: () => Promise<AxiosResponse<T>>): Promise<T> {
    try {
      const response = await call();
      return response.data;
    } catch (error) {
      const apiError = this.handleError(error, message);
      this.logger.debug(message, {
        statusCode: apiError.statusCode,
        typeKey: apiError.typeKey,
        error: apiError.message
      });
      throw apiError;
    }
  }

  private handleError(error: unknown, message: string): AzureDevOpsApiError {
    if (axios.isAxiosError(error)) {
      const body = parseErrorBody(error.response?.data);
      const serverMessage = body?.message;
      return new AzureDevOpsApiError(
        `${message}: ${serverMessage ?? error.message}`,
        error.response?.status ?? 0,
        body?.typeKey,
        serverMessage,
        error
      );
    }
    return new AzureDevOpsApiError(
      `${message}: ${error instanceof Error ? error.message : String(error)}`,
      0,
      undefined,
      undefined,
      error
    );
  }
}

export function parseErrorBody(data: unknown): AzureDevOpsErrorBody | undefined {
  if (typeof data !== 'object' || data === null) {
    return undefined;
  }

  const body: { message?: string; typeKey?: string; typeName?: string; errorCode?: number } = {};
  if ('message' in data && typeof data.message === 'string') {
    body.message = data.message;
  }
  if ('typeKey' in data && typeof data.typeKey === 'string') {
    body.typeKey = data.typeKey;
  }
  if ('typeName' in data && typeof data.typeName === 'string') {
    body.typeName = data.typeName;
  }
  if ('errorCode' in data && typeof data.errorCode === 'number') {
    body.errorCode = data.errorCode;
  }
  return body;
}
