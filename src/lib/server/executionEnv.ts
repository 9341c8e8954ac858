const PASSTHROUGH_ENV_KEYS = [
  "PATH",
  "HOME",
  "TMPDIR",
  "TMP",
  "TEMP",
  "SYSTEMROOT",
  "WINDIR",
  "PATHEXT",
  "TZ",
  "DOCKER_HOST",
  "DOCKER_CONFIG",
] as const;

/**
 * Environment for investigative tools run on the host. Credentials and other
 * process-wide state never reach the child; only lookup paths and temp dirs do.
 */
export function buildRestrictedExecutionEnv(
  source: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {
    LANG: "C.UTF-8",
    LC_ALL: "C.UTF-8",
    TERM: "dumb",
    NO_COLOR: "1",
  };

  for (const key of PASSTHROUGH_ENV_KEYS) {
    const value = source[key];
    if (typeof value === "string" && value.length > 0) {
      env[key] = value;
    }
  }

  return env;
}
