export interface ServerConfig {
  port: number;
  production: boolean;
  corsOrigins: string[];
  jsonBodyLimit: string;
}

const DEV_ORIGINS = ['http://localhost:4200', 'http://localhost:8084'];

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = Number(env.PORT);
  const origins = (env.CORS_ORIGINS || '')
    .split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);

  return {
    port: Number.isInteger(port) && port > 0 ? port : 3001,
    production: env.NODE_ENV === 'production',
    corsOrigins: origins.length > 0 ? origins : DEV_ORIGINS,
    jsonBodyLimit: env.JSON_BODY_LIMIT || '1mb',
  };
}
