/**
 * Sanitize log message to prevent log injection.
 */
export function sanitizeLogMessage(s: string): string {
  if (!s) return "";
  return s.replace(/[\r\n]/g, "\\n").replace(/\t/g, "\\t").slice(0, 10000);
}

/**
 * Redact sensitive information from messages: common credential patterns plus
 * any literal secret values the current run has materialized.
 */
export function redactSensitiveInfo(s: string, secretValues: Iterable<string> = []): string {
  if (!s) return "";

  let result = s;

  for (const value of secretValues) {
    // Very short values would mask unrelated text.
    if (value.length < 4) continue;
    result = result.split(value).join("***");
  }

  result = result.replace(/password[=:]\s*\S+/gi, "password=***");
  result = result.replace(/token[=:]\s*\S+/gi, "token=***");
  result = result.replace(/api[_-]?key[=:]\s*\S+/gi, "api_key=***");
  result = result.replace(/secret[=:]\s*\S+/gi, "secret=***");
  result = result.replace(/\/\/([^/\s:@]+):([^/\s@]+)@/g, "//$1:***@");

  return result;
}

/**
 * Minimal process environment for child commands; callers add what they need.
 */
export function sanitizeEnv(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const safe: NodeJS.ProcessEnv = {
    PATH: env.PATH,
    HOME: env.HOME,
    USER: env.USER,
    LANG: env.LANG,
    LC_ALL: env.LC_ALL,
    TERM: env.TERM,
    DOCKER_CONFIG: env.DOCKER_CONFIG,
    DOCKER_HOST: env.DOCKER_HOST,
    SSH_AUTH_SOCK: env.SSH_AUTH_SOCK,
    KUBECONFIG: env.KUBECONFIG,
  };

  Object.keys(safe).forEach((key) => {
    if (safe[key] === undefined) {
      delete safe[key];
    }
  });

  return safe;
}
