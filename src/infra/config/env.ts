export const DEFAULT_DATABASE_URL = 'http://localhost:8080';
export const DEFAULT_PAIR = 'SOLUSDC';

export interface Env {
  DATABASE_URL: string;
  ML_QUERY_PAIR: string;
  ML_EXPORT_DIR?: string;
}

function readOptional(source: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = source[key];
  if (value === undefined || value.trim() === '') {
    return undefined;
  }

  return value.trim();
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return {
    DATABASE_URL: readOptional(source, 'DATABASE_URL') ?? DEFAULT_DATABASE_URL,
    ML_QUERY_PAIR: readOptional(source, 'ML_QUERY_PAIR') ?? DEFAULT_PAIR,
    ML_EXPORT_DIR: readOptional(source, 'ML_EXPORT_DIR')
  };
}
