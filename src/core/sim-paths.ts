import { existsSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';

export function resolveSimHome(): string {
  const override = process.env.SIMSTAGE_HOME;
  if (typeof override === 'string' && override.trim().length > 0) {
    return override.trim();
  }
  return join(homedir(), '.simstage');
}

export function getSimPaths(homeOverride?: string) {
  const home = homeOverride && homeOverride.trim().length > 0 ? homeOverride.trim() : resolveSimHome();
  return {
    home,
    logs: {
      dir: join(home, 'logs'),
    },
  } as const;
}

export const SIM_HOME = resolveSimHome();
export const SIM_PATHS = getSimPaths(SIM_HOME);

export function ensureDir(path: string): string {
  if (!existsSync(path)) {
    mkdirSync(path, { recursive: true });
  }
  return path;
}
