import { GitRepositoryFileResource } from '@/services/resources/git-repository-file.resource';
import { MockGitClient } from '@/services/azure-devops/mock/mock-git-client';
import { AzureDevOpsApiError } from '@/services/azure-devops/types';
import { FileOverwriteRefusedError, ResourceIdFormatError, ResourceValidationError } from '@/services/git/git-errors';
import { Logger } from '@/services/logger';
import { FileResourceConfig, GitPush, GitPushResult } from '@/types';
import { createFakeClock, createMockGitClient, FakeClock, TEST_REPOSITORY_ID } from '../../../helpers/git-client-mocks';

const FILE_ID = `${TEST_REPOSITORY_ID}/config/app.json`;

const baseConfig: FileResourceConfig = {
  repositoryId: TEST_REPOSITORY_ID,
  file: 'config/app.json',
  content: '{}'
};

describe('GitRepositoryFileResource', () => {
  let mock: MockGitClient;
  let clock: FakeClock;
  let resource: GitRepositoryFileResource;

  beforeEach(() => {
    mock = new MockGitClient();
    mock.addRepository(TEST_REPOSITORY_ID);
    clock = createFakeClock();
    resource = new GitRepositoryFileResource({
      client: mock,
      logger: Logger.createSilentLogger(),
      timeouts: { create: 1000 },
      retryOptions: clock
    });
  });

  const pushedChangeTypes = (spy: jest.SpyInstance<Promise<GitPushResult>, [repositoryId: string, push: GitPush]>): string[] =>
    spy.mock.calls.flatMap(([, push]) => push.commits.flatMap(commit => commit.changes.map(change => change.changeType)));

  describe('validate', () => {
    it('should collect every problem', () => {
      let caught: unknown;
      try {
        GitRepositoryFileResource.validate({ repositoryId: 'a-repo', file: '', content: '', branch: '' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ResourceValidationError);
      expect(caught).toMatchObject({
        errors: [
          'repository_id must be a UUID, got "a-repo"',
          'file must not be empty',
          'branch must not be empty when set'
        ]
      });
    });
  });

  describe('create', () => {
    it('should add a new file on the default branch', async () => {
      // Given & When
      const state = await resource.create(baseConfig);

      // Then
      expect(state).toEqual({
        id: FILE_ID,
        repositoryId: TEST_REPOSITORY_ID,
        file: 'config/app.json',
        content: '{}',
        branch: 'refs/heads/master',
        commitMessage: 'Add config/app.json',
        overwriteOnCreate: false
      });
      expect(mock.readFile(TEST_REPOSITORY_ID, 'master', 'config/app.json')).toBe('{}');
    });

    it('should use the configured commit message', async () => {
      const state = await resource.create({ ...baseConfig, commitMessage: 'chore: seed config' });

      expect(state.commitMessage).toBe('chore: seed config');
    });

    it('should treat an empty commit message as unset', async () => {
      const state = await resource.create({ ...baseConfig, commitMessage: '' });

      expect(state.commitMessage).toBe('Add config/app.json');
    });

    it('should log the operation context', async () => {
      // Given
      const info = jest.spyOn(Logger.prototype, 'info');

      // When
      await resource.create(baseConfig);
      await resource.delete({ repositoryId: TEST_REPOSITORY_ID, file: 'config/app.json', branch: 'refs/heads/master' });

      // Then
      expect(info).toHaveBeenCalledWith('Creating repository file', {
        repositoryId: TEST_REPOSITORY_ID,
        branch: 'refs/heads/master',
        file: 'config/app.json',
        changeType: 'add'
      });
      expect(info).toHaveBeenCalledWith('Deleting repository file', {
        repositoryId: TEST_REPOSITORY_ID,
        branch: 'refs/heads/master',
        file: 'config/app.json'
      });
      info.mockRestore();
    });

    it('should refuse to overwrite an existing file without pushing', async () => {
      // Given: README.md는 이미 존재
      const createPush = jest.spyOn(mock, 'createPush');

      // When
      const result = resource.create({ ...baseConfig, file: 'README.md', content: 'new' });

      // Then
      await expect(result).rejects.toThrow(FileOverwriteRefusedError);
      await expect(resource.create({ ...baseConfig, file: 'README.md', content: 'new' }))
        .rejects.toThrow('Refusing to overwrite existing file. Configure "overwrite_on_create" to true to override.');
      expect(createPush).not.toHaveBeenCalled();
      expect(mock.readFile(TEST_REPOSITORY_ID, 'master', 'README.md')).toBe(`# ${TEST_REPOSITORY_ID}`);
    });

    it('should overwrite an existing file with an edit when allowed', async () => {
      // Given
      const createPush = jest.spyOn(mock, 'createPush');

      // When
      const state = await resource.create({ ...baseConfig, file: 'README.md', content: 'new', overwriteOnCreate: true });

      // Then
      expect(pushedChangeTypes(createPush)).toEqual(['edit']);
      expect(state.content).toBe('new');
      expect(state.commitMessage).toBe('Add README.md');
      expect(state.overwriteOnCreate).toBe(true);
    });

    it('should fail when the branch does not exist', async () => {
      await expect(resource.create({ ...baseConfig, branch: 'refs/heads/missing' }))
        .rejects.toThrow(`Repository branch not found, repositoryID: ${TEST_REPOSITORY_ID}, branch: refs/heads/missing`);
    });

    it('should retry when another client pushes to the branch first', async () => {
      // Given: 다음 두 번의 push가 다른 클라이언트에게 밀림
      mock.simulateConcurrentPushes(TEST_REPOSITORY_ID, 'master', 2);

      // When
      const state = await resource.create(baseConfig);

      // Then
      expect(state.content).toBe('{}');
      expect(clock.delays).toEqual([500, 500]);
    });

    it('should fail with the conflict after the create timeout', async () => {
      // Given: 다른 클라이언트가 계속 먼저 push
      mock.simulateConcurrentPushes(TEST_REPOSITORY_ID, 'master', 1000);

      // When
      const result = resource.create(baseConfig);

      // Then
      await expect(result).rejects.toThrow(
        `Create repository file failed, repositoryID: ${TEST_REPOSITORY_ID}, branch: refs/heads/master, file: config/app.json: ` +
        "Failed to create push: TF401028: The reference 'refs/heads/master' has already been updated by another client, so you cannot update it."
      );
      expect(clock.elapsed()).toBe(1000);
      expect(mock.readFile(TEST_REPOSITORY_ID, 'master', 'config/app.json')).toBeUndefined();
    });
  });

  describe('read', () => {
    it('should follow changes made outside of the resource', async () => {
      // Given
      await resource.create(baseConfig);
      mock.commitExternally(TEST_REPOSITORY_ID, 'master', 'config/app.json', '{"changed":true}');

      // When
      const state = await resource.read({ id: FILE_ID });

      // Then
      expect(state).toMatchObject({
        content: '{"changed":true}',
        commitMessage: 'External change to config/app.json'
      });
    });

    it('should report the message of the last commit that touched the file', async () => {
      // Given: 다른 파일만 바뀐 커밋
      await resource.create(baseConfig);
      mock.commitExternally(TEST_REPOSITORY_ID, 'master', 'other.txt', 'x');

      // When
      const state = await resource.read({ id: FILE_ID });

      // Then
      expect(state?.commitMessage).toBe('Add config/app.json');
    });

    it('should return null for a file that no longer exists', async () => {
      await expect(resource.read({ id: `${TEST_REPOSITORY_ID}/missing.txt` })).resolves.toBeNull();
    });

    it('should fail when the branch is missing', async () => {
      await expect(resource.read({ id: FILE_ID, branch: 'refs/heads/missing' }))
        .rejects.toThrow(`Repository branch not found, repositoryID: ${TEST_REPOSITORY_ID}, branch: refs/heads/missing`);
    });
  });

  describe('update', () => {
    it('should replace the generated add message with an update message', async () => {
      // Given
      const prior = await resource.create(baseConfig);

      // When
      const state = await resource.update(prior, { ...baseConfig, content: '{"v":2}' });

      // Then
      expect(state.content).toBe('{"v":2}');
      expect(state.commitMessage).toBe('Update config/app.json');
    });

    it('should keep a custom commit message', async () => {
      const prior = await resource.create({ ...baseConfig, commitMessage: 'chore: seed config' });

      const state = await resource.update(prior, { ...baseConfig, content: '{"v":2}' });

      expect(state.commitMessage).toBe('chore: seed config');
    });

    it('should keep the previous message when the new one is empty', async () => {
      const prior = await resource.create({ ...baseConfig, commitMessage: 'chore: seed config' });

      const state = await resource.update(prior, { ...baseConfig, content: '{"v":2}', commitMessage: '' });

      expect(state.commitMessage).toBe('chore: seed config');
    });

    it('should prefer the newly configured commit message', async () => {
      const prior = await resource.create(baseConfig);

      const state = await resource.update(prior, { ...baseConfig, content: '{"v":2}', commitMessage: 'feat: bump' });

      expect(state.commitMessage).toBe('feat: bump');
    });

    it('should push an edit change', async () => {
      const prior = await resource.create(baseConfig);
      const createPush = jest.spyOn(mock, 'createPush');

      await resource.update(prior, { ...baseConfig, content: '{"v":2}' });

      expect(pushedChangeTypes(createPush)).toEqual(['edit']);
    });
  });

  describe('delete', () => {
    it('should delete the file with a generated message', async () => {
      // Given
      await resource.create(baseConfig);
      const createPush = jest.spyOn(mock, 'createPush');

      // When
      await resource.delete({ repositoryId: TEST_REPOSITORY_ID, file: 'config/app.json', branch: 'refs/heads/master' });

      // Then
      expect(pushedChangeTypes(createPush)).toEqual(['delete']);
      expect(createPush.mock.calls[0]?.[1].commits[0]?.comment).toBe('Delete config/app.json');
      expect(mock.readFile(TEST_REPOSITORY_ID, 'master', 'config/app.json')).toBeUndefined();
      await expect(resource.read({ id: FILE_ID })).resolves.toBeNull();
    });

    it('should wrap a failed delete', async () => {
      await expect(resource.delete({ repositoryId: TEST_REPOSITORY_ID, file: 'missing.txt', branch: 'refs/heads/master' }))
        .rejects.toThrow(
          `Failed to destroy the repository file, repositoryID: ${TEST_REPOSITORY_ID}, branch: refs/heads/master, file: missing.txt`
        );
    });
  });

  describe('importState', () => {
    it('should import a file from the default branch', async () => {
      const state = await resource.importState(`${TEST_REPOSITORY_ID}/README.md`);

      expect(state).toEqual({
        id: `${TEST_REPOSITORY_ID}/README.md`,
        repositoryId: TEST_REPOSITORY_ID,
        file: 'README.md',
        content: `# ${TEST_REPOSITORY_ID}`,
        branch: 'refs/heads/master',
        commitMessage: 'Initial commit',
        overwriteOnCreate: false
      });
    });

    it('should fail for a file that does not exist on the branch', async () => {
      await expect(resource.importState(`${TEST_REPOSITORY_ID}/README.md:refs/heads/missing`))
        .rejects.toThrow(`Repository file not found, repositoryID: ${TEST_REPOSITORY_ID}, branch: refs/heads/missing, file: README.md`);
    });

    it('should reject more than one branch separator', async () => {
      await expect(resource.importState(`${TEST_REPOSITORY_ID}/README.md:a:b`)).rejects.toThrow(ResourceIdFormatError);
    });
  });

  describe('with a failing service', () => {
    it('should not treat unexpected item errors as a missing file', async () => {
      // Given: 권한 오류
      const client = createMockGitClient();
      client.getBranch.mockResolvedValue({ commit: { commitId: 'a-commit' } });
      client.getItem.mockRejectedValue(new AzureDevOpsApiError('Failed to get item: access denied', 403));
      const failing = new GitRepositoryFileResource({ client, logger: Logger.createSilentLogger() });

      // When & Then
      await expect(failing.create(baseConfig)).rejects.toThrow(
        `Query repository item failed, repositoryID: ${TEST_REPOSITORY_ID}, branch: refs/heads/master, file: config/app.json: Failed to get item: access denied`
      );
      expect(client.createPush).not.toHaveBeenCalled();
    });
  });
});
