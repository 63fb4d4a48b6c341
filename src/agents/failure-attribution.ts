import type { MissingElement, RegenerationReason, RegenerationTarget } from './schemas';

export interface FailureEvidence {
  executionFailed: boolean;
  executionLog?: string;
  missingElements: MissingElement[];
  /** Files the previous iteration targeted after a failed execution */
  previousExecutionFailures?: readonly string[];
}

export interface Attribution {
  targets: RegenerationTarget[];
  /** True when some failure could not be tied to a file and every manifest file is targeted */
  wholeProject: boolean;
}

const PATH_TOKEN = /[A-Za-z0-9_.\-/\\]+/g;

function normalize(token: string): string {
  return token
    .replace(/\\/g, '/')
    .replace(/^\.\//, '')
    .replace(/[.\-/]+$/, '');
}

/** Tokens that could name a file: they carry an extension or a directory separator */
export function pathTokens(log: string): string[] {
  const tokens = new Set<string>();
  for (const match of log.match(PATH_TOKEN) ?? []) {
    const token = normalize(match);
    if (token.includes('/') || /\.[A-Za-z0-9]+$/.test(token)) {
      tokens.add(token);
    }
  }
  return [...tokens];
}

function basename(path: string): string {
  return path.split('/').pop() ?? path;
}

/**
 * Resolves a token to a manifest path: exact match, a longer path ending in
 * `/<path>`, or a bare basename that exactly one manifest file has.
 */
export function resolveManifestPath(token: string, manifestPaths: string[]): string | undefined {
  const normalized = normalize(token);
  const exact = manifestPaths.find((p) => p === normalized);
  if (exact) return exact;

  const suffixed = manifestPaths.filter((p) => normalized.endsWith(`/${p}`));
  if (suffixed.length > 0) {
    // Longest manifest path wins: "src/a/util.py" over "util.py"
    return suffixed.reduce((best, p) => (p.length > best.length ? p : best));
  }

  if (!normalized.includes('/')) {
    const byBase = manifestPaths.filter((p) => basename(p) === normalized);
    if (byBase.length === 1) return byBase[0];
  }

  return undefined;
}

export function extractErrorLines(log: string, limit = 10): string[] {
  return log
    .split('\n')
    .filter((line) => /error|fail|exception|assert|traceback|at\s+/i.test(line))
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .slice(0, limit);
}

/**
 * Decides which files a regeneration should rewrite. Execution failure wins
 * the reason when both sources name a file, in this iteration or across the
 * previous one; anything unattributable widens the target set to the whole
 * manifest.
 */
export function attributeFailures(manifestPaths: string[], evidence: FailureEvidence): Attribution {
  const executionFiles = new Set<string>();
  const missingByFile = new Map<string, string[]>();
  const unattributed: string[] = [];
  let ambiguous = false;

  if (evidence.executionFailed) {
    for (const token of pathTokens(evidence.executionLog ?? '')) {
      const path = resolveManifestPath(token, manifestPaths);
      if (path) executionFiles.add(path);
    }
    if (executionFiles.size === 0) ambiguous = true;
  }

  for (const element of evidence.missingElements) {
    const path = element.file ? resolveManifestPath(element.file, manifestPaths) : undefined;
    if (path) {
      missingByFile.set(path, [...(missingByFile.get(path) ?? []), element.description]);
    } else {
      unattributed.push(element.file ? `${element.file}: ${element.description}` : element.description);
      ambiguous = true;
    }
  }

  const errorLines = evidence.executionFailed ? extractErrorLines(evidence.executionLog ?? '') : [];

  const targets: RegenerationTarget[] = [];
  for (const path of manifestPaths) {
    const namedByExecution = executionFiles.has(path);
    const missing = missingByFile.get(path) ?? [];
    if (!ambiguous && !namedByExecution && missing.length === 0) continue;

    const failedHere = namedByExecution || (evidence.executionFailed && executionFiles.size === 0);
    const failedBefore = missing.length > 0 && (evidence.previousExecutionFailures ?? []).includes(path);
    const reason: RegenerationReason = failedHere || failedBefore ? 'execution_failure' : 'missing_elements';

    const details: string[] = [...missing, ...(ambiguous ? unattributed : [])];
    if (failedHere) {
      const mentioning = errorLines.filter((line) => line.includes(basename(path)));
      details.push(...(mentioning.length > 0 ? mentioning : errorLines));
    } else if (failedBefore) {
      details.push('failed execution in the previous iteration');
    }

    targets.push({ path, reason, details: [...new Set(details)] });
  }

  return { targets, wholeProject: ambiguous };
}
