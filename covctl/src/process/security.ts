import path from "node:path";

const ENV_KEYS = ["PATH", "HOME", "USER", "LOGNAME", "LANG", "LC_ALL", "TERM", "TMPDIR", "SHELL", "SSH_AUTH_SOCK"];

/** Toolchain and hosting-CLI variables a build or `gh` needs to keep working. */
const ENV_PREFIXES = ["JAVA_", "MAVEN_", "M2_", "GRADLE_", "GH_", "GITHUB_", "XDG_", "GIT_"];

/**
 * Sanitize environment variables for subprocess execution.
 */
export function sanitizeEnv(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const safe: NodeJS.ProcessEnv = {};
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined) continue;
    if (ENV_KEYS.includes(key) || ENV_PREFIXES.some((prefix) => key.startsWith(prefix))) {
      safe[key] = value;
    }
  }
  return safe;
}

/**
 * Redact sensitive information from messages before they are logged.
 */
export function redactSensitiveInfo(s: string): string {
  if (!s) return "";

  let result = s;
  result = result.replace(/password[=:]\s*\S+/gi, "password=***");
  result = result.replace(/token[=:]\s*\S+/gi, "token=***");
  result = result.replace(/api[_-]?key[=:]\s*\S+/gi, "api_key=***");
  result = result.replace(/secret[=:]\s*\S+/gi, "secret=***");
  result = result.replace(/(https?:\/\/)[^/\s:@]+:[^/\s@]+@/g, "$1***@");
  return result;
}

/**
 * Resolve `relativePath` under `base`, refusing anything that would land outside it.
 * Returns null when the path is absolute, contains NUL, or escapes `base`.
 */
export function resolveInside(base: string, relativePath: string): string | null {
  if (relativePath.length === 0 || relativePath.includes("\0")) return null;
  if (path.isAbsolute(relativePath) || path.win32.isAbsolute(relativePath)) return null;

  const normalizedBase = path.resolve(base);
  const fullPath = path.resolve(normalizedBase, relativePath);
  if (fullPath === normalizedBase) return null;
  if (!fullPath.startsWith(normalizedBase + path.sep)) return null;
  return fullPath;
}
