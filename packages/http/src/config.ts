export type AppConfig = Record<string, string>;

const APP_PREFIX = "ARGWIRE_APP_";

/**
 * Builds the application config mapping from `ARGWIRE_APP_*` variables. Keys are
 * lower-cased and a double underscore becomes a dot:
 * `ARGWIRE_APP_DB__URL` is read as `db.url`.
 */
export function readAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const config: AppConfig = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(APP_PREFIX) || value === undefined) continue;
    const name = key.slice(APP_PREFIX.length).toLowerCase().split("__").join(".");
    if (name) config[name] = value;
  }
  return config;
}
