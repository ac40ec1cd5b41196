export interface ServerConfig {
  databaseUrl: string | undefined;
  apiKey: string | undefined;
  port: number;
}

const DEFAULT_PORT = 5000;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = parseInt(env.PORT || "", 10);
  return {
    databaseUrl: env.DATABASE_URL,
    apiKey: env.API_KEY || undefined,
    port: Number.isFinite(port) && port > 0 ? port : DEFAULT_PORT,
  };
}
