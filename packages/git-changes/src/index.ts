import { listChangedFiles, type ChangedFiles, type ListChangedFilesInput } from "./application/list-changed-files.js";
import { ExecGitCommandClient } from "./infrastructure/git-command-client.js";
import { GitCliChangedFilesProvider } from "./infrastructure/git-changed-files-provider.js";

export type { ChangedFilesProvider } from "./application/changed-files-provider.js";
export {
  listChangedFiles,
  type ChangedFiles,
  type ChangedFilesProgressEvent,
  type ListChangedFilesInput,
} from "./application/list-changed-files.js";
export { ExecGitCommandClient, GitCommandError, type GitCommandClient } from "./infrastructure/git-command-client.js";
export { GitCliChangedFilesProvider } from "./infrastructure/git-changed-files-provider.js";

export const listChangedFilesFromGit = (input: ListChangedFilesInput): ChangedFiles =>
  listChangedFiles(input, new GitCliChangedFilesProvider(new ExecGitCommandClient()));
