import { DEFAULT_FILE_BRANCH, REFS_HEADS_PREFIX } from '../types';
import { ResourceIdFormatError } from '../services/git/git-errors';

export interface BranchIdentifier {
  readonly repositoryId: string;
  readonly branchName: string;
}

export interface FileIdentifier {
  readonly repositoryId: string;
  readonly file: string;
}

export interface FileImportIdentifier extends FileIdentifier {
  readonly branch: string;
}

const BRANCH_ID_FORMAT = '<repository id>:<branch name>';
const FILE_ID_FORMAT = '<repository id>/<file path> (when branch is "master") or <repository id>/<file path>:<branch>';

/**
 * ResourceIdentifier - 리소스 복합 ID 인코딩/디코딩 유틸리티 클래스
 */
export class ResourceIdentifier {
  static formatBranchId(repositoryId: string, branchName: string): string {
    return `${repositoryId}:${branchName}`;
  }

  /**
   * "repositoryId:branchName" 형식 파싱 (Git 브랜치 이름에는 ':'가 올 수 없음)
   */
  static parseBranchId(id: string): BranchIdentifier {
    const parts = id.split(':');
    const [repositoryId, branchName] = parts;
    if (parts.length !== 2 || !repositoryId || !branchName) {
      throw new ResourceIdFormatError(id, BRANCH_ID_FORMAT);
    }
    return { repositoryId, branchName };
  }

  static formatFileId(repositoryId: string, file: string): string {
    return `${repositoryId}/${file}`;
  }

  /**
   * 첫 번째 '/' 앞은 저장소 ID, 나머지는 파일 경로
   */
  static parseFileId(id: string): FileIdentifier {
    const separator = id.indexOf('/');
    if (separator <= 0 || separator === id.length - 1) {
      throw new ResourceIdFormatError(id, FILE_ID_FORMAT);
    }
    return {
      repositoryId: id.slice(0, separator),
      file: id.slice(separator + 1)
    };
  }

  /**
   * import ID: "repositoryId/filePath" 또는 "repositoryId/filePath:branch"
   */
  static parseFileImportId(id: string): FileImportIdentifier {
    const parts = id.split(':');
    if (parts.length > 2) {
      throw new ResourceIdFormatError(id, FILE_ID_FORMAT);
    }

    const [fileId = '', branch = DEFAULT_FILE_BRANCH] = parts;
    if (!branch) {
      throw new ResourceIdFormatError(id, FILE_ID_FORMAT);
    }

    return { ...this.parseFileId(fileId), branch };
  }

  static withRefsHeadsPrefix(branchName: string): string {
    if (branchName.startsWith(REFS_HEADS_PREFIX)) {
      return branchName;
    }
    return `${REFS_HEADS_PREFIX}${branchName}`;
  }

  // 일부 API는 refs/heads/ 없는 짧은 이름을 요구
  static shortBranchName(branch: string): string {
    return branch.startsWith(REFS_HEADS_PREFIX) ? branch.slice(REFS_HEADS_PREFIX.length) : branch;
  }
}
