import { readFile } from "fs/promises";
import path from "path";
import ignore from "ignore";
import micromatch from "micromatch";

type Ignore = ReturnType<typeof ignore>;

export const DEFAULT_IGNORE_PATTERNS = [
  "**/node_modules/**",
  "**/venv/**",
  "**/env/**",
  "**/.git/**",
  "**/__pycache__/**",
  "**/target/**",
  "**/build/**",
  "**/dist/**"
];

/**
 * Glob patterns (`*`, `**`, `?`) matched against paths relative to the
 * analysis root, plus the root `.gitignore` when one was loaded.
 */
export type IgnoreRuleSet = {
  patterns: string[];
  gitignore: Ignore | null;
};

export function toPosixRelative(root: string, filePath: string): string {
  return path.relative(root, filePath).split(path.sep).join("/");
}

export function createIgnoreRules(
  patterns: string[] = DEFAULT_IGNORE_PATTERNS,
  gitignoreContent?: string
): IgnoreRuleSet {
  return {
    patterns: [...patterns],
    gitignore: gitignoreContent === undefined ? null : ignore().add(gitignoreContent)
  };
}

async function readGitignore(projectRoot: string): Promise<string | undefined> {
  try {
    return await readFile(path.join(projectRoot, ".gitignore"), "utf8");
  } catch (error: unknown) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}

export async function loadIgnoreRules(
  projectRoot: string,
  patterns: string[] = DEFAULT_IGNORE_PATTERNS,
  useGitignore = true
): Promise<IgnoreRuleSet> {
  const gitignoreContent = useGitignore ? await readGitignore(projectRoot) : undefined;
  return createIgnoreRules(patterns, gitignoreContent);
}

/**
 * @param relativePath - `/`-separated path relative to the analysis root
 * @param isDirectory - directories are also tested with a trailing slash so
 *   that `dir/**` and gitignore `dir/` rules prune them
 */
export function isIgnored(rules: IgnoreRuleSet, relativePath: string, isDirectory = false): boolean {
  if (!relativePath || relativePath.startsWith("..")) {
    return false;
  }
  const candidates = isDirectory ? [relativePath, `${relativePath}/`] : [relativePath];
  if (candidates.some((candidate) => micromatch.isMatch(candidate, rules.patterns, { dot: true }))) {
    return true;
  }
  if (rules.gitignore) {
    return candidates.some((candidate) => rules.gitignore?.ignores(candidate) ?? false);
  }
  return false;
}

/**
 * True when `relativePath` or any of its parent directories is ignored.
 */
export function isPathExcluded(rules: IgnoreRuleSet, relativePath: string): boolean {
  const parts = relativePath.split("/").filter(Boolean);
  for (let depth = 1; depth < parts.length; depth += 1) {
    if (isIgnored(rules, parts.slice(0, depth).join("/"), true)) {
      return true;
    }
  }
  return isIgnored(rules, relativePath);
}
