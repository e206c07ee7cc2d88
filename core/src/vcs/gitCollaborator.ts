import { execFile } from "child_process";
import { promisify } from "util";

export interface VcsCollaborator {
  /**
   * Commit and publish the modified files. Resolves to a link describing the
   * change, or undefined when any step fails.
   */
  createDocumentationChange(filesModified: string[], symbolCount: number): Promise<string | undefined>;
}

export type GitRunner = (args: string[], cwd: string) => Promise<string>;

export type GitCollaboratorOptions = {
  cwd: string;
  baseBranch?: string;
  remote?: string;
  branchPrefix?: string;
  run?: GitRunner;
  now?: () => Date;
};

const execFileAsync = promisify(execFile);

const runGit: GitRunner = async (args, cwd) => {
  const { stdout } = await execFileAsync("git", args, { cwd, encoding: "utf8" });
  return stdout;
};

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function branchNameFor(prefix: string, date: Date): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${prefix}${day}-${time}`;
}

export function commitMessageFor(filesModified: string[], symbolCount: number): string {
  return [
    `docs: Auto-generate documentation for ${symbolCount} functions/classes`,
    "",
    "Files modified:",
    ...filesModified.map((file) => `- ${file}`)
  ].join("\n");
}

/**
 * `owner/repo` of a GitHub remote URL in https, ssh or scp-like form.
 */
export function parseGithubRepo(remoteUrl: string): string | null {
  const match = /github\.com[:/]([^/\s]+)\/([^/\s]+?)(?:\.git)?\/?$/.exec(remoteUrl.trim());
  return match ? `${match[1]}/${match[2]}` : null;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Git-backed collaborator: new branch, commit, push. Returns a GitHub
 * compare link when the remote is on GitHub, otherwise the pushed branch.
 */
export function createGitCollaborator(options: GitCollaboratorOptions): VcsCollaborator {
  const run = options.run ?? runGit;
  const baseBranch = options.baseBranch ?? "main";
  const remote = options.remote ?? "origin";
  const branchPrefix = options.branchPrefix ?? "docgap/auto-docs-";
  const now = options.now ?? (() => new Date());

  return {
    async createDocumentationChange(filesModified, symbolCount) {
      if (filesModified.length === 0) {
        console.log("[gitCollaborator] no files modified, nothing to commit");
        return undefined;
      }
      const branch = branchNameFor(branchPrefix, now());
      try {
        await run(["checkout", "-b", branch], options.cwd);
        await run(["add", "--", ...filesModified], options.cwd);
        await run(["commit", "-m", commitMessageFor(filesModified, symbolCount)], options.cwd);
        await run(["push", "-u", remote, branch], options.cwd);
        const remoteUrl = await run(["remote", "get-url", remote], options.cwd);
        const repo = parseGithubRepo(remoteUrl);
        const link = repo
          ? `https://github.com/${repo}/compare/${baseBranch}...${branch}?expand=1`
          : branch;
        console.log(`[gitCollaborator] pushed ${branch}: ${link}`);
        return link;
      } catch (error) {
        console.warn(`[gitCollaborator] failed to publish ${branch}: ${describeError(error)}`);
        return undefined;
      }
    }
  };
}
