import fs from 'fs';
import os from 'os';
import path from 'path';
import { createCLI, CliIO } from '@/cli/commands';
import { GitResourceProvider } from '@/app';
import { MockGitClient } from '@/services/azure-devops/mock/mock-git-client';
import { Logger } from '@/services/logger';
import { INITIAL_COMMIT_ID, TEST_REPOSITORY_ID } from '../../helpers/git-client-mocks';

describe('CLI', () => {
  let tempDir: string;
  let configPath: string;
  let mock: MockGitClient;
  let io: { out: jest.Mock<void, [string]>; err: jest.Mock<void, [string]> };

  const run = async (...args: string[]): Promise<void> => {
    const cliIO: CliIO = io;
    const program = createCLI({
      io: cliIO,
      createProvider: config => new GitResourceProvider(config, { client: mock, logger: Logger.createSilentLogger() })
    });
    await program.parseAsync(['node', 'azdo-git', '-c', configPath, ...args]);
  };

  const lastOutput = (): unknown => {
    const call = io.out.mock.calls[io.out.mock.calls.length - 1];
    return call ? JSON.parse(call[0]) : undefined;
  };

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'azdo-git-cli-'));
    // 설정 파일 없이 jest.setup의 환경 변수 사용
    configPath = path.join(tempDir, 'azdo-git.json');
    mock = new MockGitClient();
    mock.addRepository(TEST_REPOSITORY_ID);
    io = { out: jest.fn(), err: jest.fn() };
  });

  afterEach(() => {
    process.exitCode = undefined;
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('branch', () => {
    it('should import an existing branch', async () => {
      // When
      await run('branch', 'import', `${TEST_REPOSITORY_ID}:master`);

      // Then
      expect(io.err).not.toHaveBeenCalled();
      expect(lastOutput()).toEqual({
        id: `${TEST_REPOSITORY_ID}:master`,
        repositoryId: TEST_REPOSITORY_ID,
        name: 'master',
        isDefault: true
      });
    });

    it('should create a branch from a ref and delete it again', async () => {
      // Given & When
      await run('branch', 'create', '--repository-id', TEST_REPOSITORY_ID, '--name', 'feature', '--ref', 'refs/heads/master');

      // Then
      expect(lastOutput()).toEqual({
        id: `${TEST_REPOSITORY_ID}:feature`,
        repositoryId: TEST_REPOSITORY_ID,
        name: 'feature',
        ref: 'refs/heads/master',
        isDefault: false
      });

      // When
      await run('branch', 'delete', `${TEST_REPOSITORY_ID}:feature`);

      // Then
      expect(lastOutput()).toEqual({ id: `${TEST_REPOSITORY_ID}:feature`, deleted: true });
      expect(mock.getRefObjectId(TEST_REPOSITORY_ID, 'refs/heads/feature')).toBeUndefined();
    });

    it('should create a branch from an explicit commit', async () => {
      await run('branch', 'create', '--repository-id', TEST_REPOSITORY_ID, '--name', 'pinned', '--source-sha', INITIAL_COMMIT_ID);

      expect(lastOutput()).toEqual({
        id: `${TEST_REPOSITORY_ID}:pinned`,
        repositoryId: TEST_REPOSITORY_ID,
        name: 'pinned',
        sourceSha: INITIAL_COMMIT_ID,
        isDefault: false
      });
    });

    it('should print null for a branch that does not exist', async () => {
      await run('branch', 'read', `${TEST_REPOSITORY_ID}:missing`);

      expect(io.out).toHaveBeenCalledWith('null');
    });

    it('should report errors on stderr and set the exit code', async () => {
      // When
      await run('branch', 'read', 'bad-id');

      // Then
      expect(io.out).not.toHaveBeenCalled();
      expect(io.err).toHaveBeenCalledWith(
        '❌ Invalid ID "bad-id" specified. Supplied ID must be written as <repository id>:<branch name>'
      );
      expect(process.exitCode).toBe(1);
    });
  });

  describe('file', () => {
    it('should create, update and delete a file', async () => {
      // Given & When: 생성
      await run('file', 'create', '--repository-id', TEST_REPOSITORY_ID, '--file', 'notes.txt', '--content', 'v1');

      // Then
      expect(lastOutput()).toEqual({
        id: `${TEST_REPOSITORY_ID}/notes.txt`,
        repositoryId: TEST_REPOSITORY_ID,
        file: 'notes.txt',
        content: 'v1',
        branch: 'refs/heads/master',
        commitMessage: 'Add notes.txt',
        overwriteOnCreate: false
      });

      // When: 변경
      await run('file', 'update', `${TEST_REPOSITORY_ID}/notes.txt`, '--content', 'v2');

      // Then
      expect(lastOutput()).toMatchObject({ content: 'v2', commitMessage: 'Update notes.txt' });

      // When: 삭제
      await run('file', 'delete', `${TEST_REPOSITORY_ID}/notes.txt`);

      // Then
      expect(lastOutput()).toEqual({ id: `${TEST_REPOSITORY_ID}/notes.txt`, deleted: true });
      expect(mock.readFile(TEST_REPOSITORY_ID, 'master', 'notes.txt')).toBeUndefined();
      expect(io.err).not.toHaveBeenCalled();
    });

    it('should read content from a local file', async () => {
      // Given
      const contentFile = path.join(tempDir, 'content.txt');
      fs.writeFileSync(contentFile, 'from disk');

      // When
      await run('file', 'create', '--repository-id', TEST_REPOSITORY_ID, '--file', 'disk.txt', '--content-file', contentFile);

      // Then
      expect(mock.readFile(TEST_REPOSITORY_ID, 'master', 'disk.txt')).toBe('from disk');
    });

    it('should overwrite an existing file only when asked to', async () => {
      // When: 덮어쓰기 미허용
      await run('file', 'create', '--repository-id', TEST_REPOSITORY_ID, '--file', 'README.md', '--content', 'new');

      // Then
      expect(io.err).toHaveBeenCalledWith(
        '❌ Refusing to overwrite existing file. Configure "overwrite_on_create" to true to override.'
      );

      // When: 덮어쓰기 허용
      await run('file', 'create', '--repository-id', TEST_REPOSITORY_ID, '--file', 'README.md', '--content', 'new', '--overwrite-on-create');

      // Then
      expect(lastOutput()).toMatchObject({ content: 'new', overwriteOnCreate: true });
    });

    it('should require content', async () => {
      await run('file', 'create', '--repository-id', TEST_REPOSITORY_ID, '--file', 'empty.txt');

      expect(io.err).toHaveBeenCalledWith('❌ Either --content or --content-file is required');
    });

    it('should import a file from a branch', async () => {
      await run('file', 'import', `${TEST_REPOSITORY_ID}/README.md:refs/heads/master`);

      expect(lastOutput()).toMatchObject({
        file: 'README.md',
        content: `# ${TEST_REPOSITORY_ID}`,
        commitMessage: 'Initial commit'
      });
    });
  });

  describe('config', () => {
    it('should validate the configuration', async () => {
      await run('config', '--validate');

      expect(io.out).toHaveBeenCalledWith('✅ 설정 파일이 유효합니다.');
    });

    it('should mask the personal access token', async () => {
      await run('config');

      expect(lastOutput()).toMatchObject({
        azureDevOps: {
          orgServiceUrl: 'https://dev.azure.com/test-org',
          personalAccessToken: '***'
        }
      });
    });
  });
});
