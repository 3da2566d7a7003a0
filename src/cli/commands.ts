import fs from 'fs';
import { Command } from 'commander';
import { GitResourceProvider } from '../app';
import { AppConfig, AppConfigLoader } from '../config/app-config';
import { FileResourceConfig } from '../types';
import { ResourceIdentifier } from '../utils/ResourceIdentifier';

export interface CliIO {
  readonly out: (line: string) => void;
  readonly err: (line: string) => void;
}

export interface CliOptions {
  readonly io?: CliIO;
  readonly createProvider?: (config: AppConfig) => GitResourceProvider;
}

interface GlobalOptions {
  config: string;
}

interface ContentOptions {
  content?: string;
  contentFile?: string;
}

interface FileCreateOptions extends ContentOptions {
  repositoryId: string;
  file: string;
  branch?: string;
  commitMessage?: string;
  overwriteOnCreate?: boolean;
}

interface FileUpdateOptions extends ContentOptions {
  branch?: string;
  commitMessage?: string;
}

const defaultIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line)
};

function readContent(options: ContentOptions): string {
  if (options.content !== undefined) {
    return options.content;
  }
  if (options.contentFile !== undefined) {
    return fs.readFileSync(options.contentFile, 'utf8');
  }
  throw new Error('Either --content or --content-file is required');
}

export function createCLI(cliOptions: CliOptions = {}): Command {
  const io = cliOptions.io ?? defaultIO;
  const program = new Command();

  program
    .name('azdo-git')
    .description('Manage Azure DevOps Git branches and files declaratively')
    .version('1.0.0')
    .option('-c, --config <path>', '설정 파일 경로', './azdo-git.json');

  const loadConfig = (): AppConfig => {
    const { config: configPath } = program.opts<GlobalOptions>();
    const config = AppConfigLoader.loadFromFile(configPath);
    AppConfigLoader.validate(config);
    return config;
  };

  // 결과는 JSON으로 stdout에, 실패 메시지는 stderr로 출력
  const run = async (action: (provider: GitResourceProvider) => Promise<unknown>): Promise<void> => {
    let provider: GitResourceProvider | undefined;
    try {
      const config = loadConfig();
      provider = cliOptions.createProvider ? cliOptions.createProvider(config) : new GitResourceProvider(config);
      const result = await action(provider);
      io.out(JSON.stringify(result ?? null, null, 2));
    } catch (error) {
      io.err(`❌ ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    } finally {
      await provider?.shutdown();
    }
  };

  const branch = program.command('branch').description('Git 브랜치 리소스');

  branch
    .command('create')
    .description('브랜치 생성 (ref/source-sha가 없으면 초기 커밋으로 고아 브랜치 생성)')
    .requiredOption('--repository-id <uuid>', '저장소 ID')
    .requiredOption('--name <name>', '브랜치 이름')
    .option('--ref <ref>', '기준 ref (예: refs/heads/main, refs/tags/v1)')
    .option('--source-sha <sha>', '기준 commit id (--ref 대신 사용)')
    .action((options: { repositoryId: string; name: string; ref?: string; sourceSha?: string }) =>
      run(provider => provider.branches.create({
        repositoryId: options.repositoryId,
        name: options.name,
        ref: options.ref,
        sourceSha: options.sourceSha
      }))
    );

  branch
    .command('read <id>')
    .description('브랜치 조회 (id: <repository id>:<branch name>)')
    .action((id: string) => run(provider => provider.branches.read({ id })));

  branch
    .command('delete <id>')
    .description('브랜치 삭제')
    .action((id: string) => run(async provider => {
      await provider.branches.delete({ id });
      return { id, deleted: true };
    }));

  branch
    .command('import <id>')
    .description('기존 브랜치 가져오기')
    .action((id: string) => run(provider => provider.branches.importState(id)));

  const file = program.command('file').description('Git 파일 리소스');

  file
    .command('create')
    .description('브랜치에 파일 커밋')
    .requiredOption('--repository-id <uuid>', '저장소 ID')
    .requiredOption('--file <path>', '파일 경로')
    .option('--content <text>', '파일 내용')
    .option('--content-file <path>', '파일 내용을 읽을 로컬 파일')
    .option('--branch <branch>', '대상 브랜치', 'refs/heads/master')
    .option('--commit-message <message>', '커밋 메시지')
    .option('--overwrite-on-create', '이미 존재하는 파일 덮어쓰기 허용', false)
    .action((options: FileCreateOptions) => run(provider => {
      const config: FileResourceConfig = {
        repositoryId: options.repositoryId,
        file: options.file,
        content: readContent(options),
        branch: options.branch,
        commitMessage: options.commitMessage,
        overwriteOnCreate: options.overwriteOnCreate
      };
      return provider.files.create(config);
    }));

  file
    .command('read <id>')
    .description('파일 조회 (id: <repository id>/<file path>)')
    .option('--branch <branch>', '대상 브랜치', 'refs/heads/master')
    .action((id: string, options: { branch: string }) =>
      run(provider => provider.files.read({ id, branch: options.branch }))
    );

  file
    .command('update <id>')
    .description('파일 내용 변경')
    .option('--content <text>', '파일 내용')
    .option('--content-file <path>', '파일 내용을 읽을 로컬 파일')
    .option('--branch <branch>', '대상 브랜치', 'refs/heads/master')
    .option('--commit-message <message>', '커밋 메시지')
    .action((id: string, options: FileUpdateOptions) => run(async provider => {
      const content = readContent(options);
      const prior = await provider.files.read({ id, branch: options.branch });
      if (!prior) {
        throw new Error(`Repository file ${id} no longer exists on branch ${options.branch}`);
      }
      return provider.files.update(prior, {
        repositoryId: prior.repositoryId,
        file: prior.file,
        content,
        branch: prior.branch,
        commitMessage: options.commitMessage
      });
    }));

  file
    .command('delete <id>')
    .description('파일 삭제')
    .option('--branch <branch>', '대상 브랜치', 'refs/heads/master')
    .action((id: string, options: { branch: string }) => run(async provider => {
      const { repositoryId, file: filePath } = ResourceIdentifier.parseFileId(id);
      await provider.files.delete({ repositoryId, file: filePath, branch: options.branch });
      return { id, deleted: true };
    }));

  file
    .command('import <id>')
    .description('기존 파일 가져오기 (id: <repository id>/<file path>[:<branch>])')
    .action((id: string) => run(provider => provider.files.importState(id)));

  program
    .command('config')
    .description('설정 확인')
    .option('--validate', '설정 유효성 검사만 수행')
    .action((options: { validate?: boolean }) => {
      try {
        const { config: configPath } = program.opts<GlobalOptions>();
        const config = AppConfigLoader.loadFromFile(configPath);

        if (options.validate) {
          AppConfigLoader.validate(config);
          io.out('✅ 설정 파일이 유효합니다.');
          return;
        }

        // 토큰은 출력하지 않음
        io.out(JSON.stringify({
          ...config,
          azureDevOps: { ...config.azureDevOps, personalAccessToken: config.azureDevOps.personalAccessToken ? '***' : '' }
        }, null, 2));
      } catch (error) {
        io.err(`❌ ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
      }
    });

  return program;
}
