import type { LogLevel } from '../logging/logger.js';

export type AppEnv = 'development' | 'test' | 'staging' | 'production';

export type AccessConfig = {
  app?: { name?: string; env?: AppEnv };
  denial?: {
    /** 404 hides the resource's existence from unauthorized callers. */
    status?: 403 | 404;
    message?: string;
  };
  declarations?: { dir: string };
  logging?: { level?: LogLevel };
};

export type ResolvedAccessConfig = {
  app: { name: string; env: AppEnv };
  denial: { status: 403 | 404; message: string };
  declarations: { dir: string } | null;
  logging: { level: LogLevel };
};
