import path from 'path';

// Read on each call so variables loaded from .env files after import still apply
export function dataRoot(env: NodeJS.ProcessEnv = process.env): string {
  return env.DATA_ROOT || path.join(process.cwd(), 'data');
}

/** Where the pipeline looks when no source is given */
export function defaultSourcePath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(dataRoot(env), 'tmdb_movies.csv');
}
