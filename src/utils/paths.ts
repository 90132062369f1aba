import path from 'path';

export function secretsFilePath(configDir: string): string {
  return path.join(configDir, 'secrets.json');
}

export function cacheDir(configDir: string): string {
  return path.join(configDir, 'cache');
}

export function logFilePath(configDir: string): string {
  return path.join(configDir, 'logs', 'patcher.log');
}
