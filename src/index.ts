#!/usr/bin/env node
import { config } from 'dotenv';
import { createCLI } from './cli/commands';

// Load environment variables (quiet to suppress logs)
config({ quiet: true });

/**
 * azdo-git main entry point
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createCLI();
  await program.parseAsync(argv);
}

// Export classes for programmatic usage
export { GitResourceProvider } from './app';
export { AppConfigLoader } from './config/app-config';
export type { AppConfig } from './config/app-config';
export { AzureDevOpsApiClient } from './services/azure-devops/azure-devops-api-client';
export { AzureDevOpsApiError, isConcurrentUpdateError, isNotFoundError } from './services/azure-devops/types';
export { MockGitClient } from './services/azure-devops/mock/mock-git-client';
export {
  FileOverwriteRefusedError,
  GitResourceError,
  RefUpdateError,
  ResourceIdFormatError,
  ResourceValidationError,
  SourceRefNotFoundError
} from './services/git/git-errors';
export { GitRepositoryBranchResource } from './services/resources/git-repository-branch.resource';
export { GitRepositoryFileResource } from './services/resources/git-repository-file.resource';
export { Logger, LogLevel } from './services/logger';
export { ResourceIdentifier } from './utils/ResourceIdentifier';
export * from './types';

// Run the application if this file is executed directly
if (require.main === module) {
  main().catch((error) => {
    console.error('❌ Unhandled error:', error);
    process.exit(1);
  });
}
