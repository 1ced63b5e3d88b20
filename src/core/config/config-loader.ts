/**
 * Simstage Core - Config Loader
 *
 * Loads a run configuration (YAML): simulation settings, detectors and the module chain.
 */

import fs from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigError } from '../errors.js';
import { Configuration, type ConfigValue } from './configuration.js';

export interface DetectorEntry {
  name: string;
  type: string;
  position: [number, number, number];
}

export interface ModuleEntry {
  type: string;
  /** Explicit instance name; defaults are derived by the module manager */
  name?: string;
  config: Configuration;
}

export interface RunConfig {
  sourcePath?: string;
  simulation: Configuration;
  detectors: DetectorEntry[];
  modules: ModuleEntry[];
}

export const SIMULATION_SECTION = 'simulation';

export function loadRunConfig(filePath: string): RunConfig {
  const absPath = path.isAbsolute(filePath) ? filePath : path.resolve(process.cwd(), filePath);
  if (!fs.existsSync(absPath)) {
    throw new ConfigError(`Configuration file not found: ${absPath}`, { path: absPath });
  }
  const content = fs.readFileSync(absPath, 'utf-8');
  return parseRunConfig(content, absPath);
}

export function parseRunConfig(content: string, sourcePath?: string): RunConfig {
  const where = sourcePath ? `: ${sourcePath}` : '';
  const baseDir = sourcePath ? path.dirname(sourcePath) : process.cwd();

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new ConfigError(`Invalid YAML${where}: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (parsed === null || parsed === undefined) {
    parsed = {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Run configuration must be a mapping${where}`);
  }

  const simulationRaw = parsed[SIMULATION_SECTION] ?? {};
  if (!isRecord(simulationRaw)) {
    throw new ConfigError(`'${SIMULATION_SECTION}' must be a mapping${where}`);
  }

  return {
    sourcePath,
    simulation: new Configuration(SIMULATION_SECTION, toConfigRecord(SIMULATION_SECTION, simulationRaw), baseDir),
    detectors: parseDetectors(parsed.detectors ?? [], where),
    modules: parseModules(parsed.modules ?? [], where, baseDir),
  };
}

function parseDetectors(raw: unknown, where: string): DetectorEntry[] {
  if (!Array.isArray(raw)) {
    throw new ConfigError(`'detectors' must be a list${where}`);
  }
  return raw.map((item: unknown, index) => {
    if (!isRecord(item)) {
      throw new ConfigError(`detectors[${index}] must be a mapping${where}`);
    }
    const { name, type } = item;
    if (typeof name !== 'string' || name.length === 0) {
      throw new ConfigError(`detectors[${index}] requires a 'name'${where}`);
    }
    if (typeof type !== 'string' || type.length === 0) {
      throw new ConfigError(`detector '${name}' requires a 'type'${where}`);
    }
    return { name, type, position: parsePosition(item.position, name, where) };
  });
}

function parsePosition(raw: unknown, detector: string, where: string): [number, number, number] {
  if (raw === undefined) {
    return [0, 0, 0];
  }
  if (!Array.isArray(raw) || raw.length !== 3) {
    throw new ConfigError(`position of detector '${detector}' must be a list of three numbers${where}`);
  }
  const [x, y, z] = raw.map((coord: unknown) => {
    if (typeof coord !== 'number') {
      throw new ConfigError(`position of detector '${detector}' must be a list of three numbers${where}`);
    }
    return coord;
  });
  return [x, y, z];
}

function parseModules(raw: unknown, where: string, baseDir: string): ModuleEntry[] {
  if (!Array.isArray(raw)) {
    throw new ConfigError(`'modules' must be a list${where}`);
  }
  return raw.map((item: unknown, index) => {
    if (!isRecord(item)) {
      throw new ConfigError(`modules[${index}] must be a mapping${where}`);
    }
    const { type, name: rawName, ...rest } = item;
    if (typeof type !== 'string' || type.length === 0) {
      throw new ConfigError(`modules[${index}] requires a 'type'${where}`);
    }
    let name: string | undefined;
    if (rawName !== undefined) {
      if (typeof rawName !== 'string' || rawName.length === 0) {
        throw new ConfigError(`modules[${index}] has an invalid 'name'${where}`);
      }
      name = rawName;
    }
    const section = name ?? type;
    return {
      type,
      name,
      config: new Configuration(section, toConfigRecord(section, rest), baseDir),
    };
  });
}

function toConfigRecord(section: string, raw: Record<string, unknown>): Record<string, ConfigValue> {
  const result: Record<string, ConfigValue> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === null || value === undefined) {
      continue;
    }
    result[key] = toConfigValue(section, key, value);
  }
  return result;
}

function toConfigValue(section: string, key: string, value: unknown): ConfigValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toConfigValue(section, key, item));
  }
  throw new ConfigError(`Unsupported value for '${key}' in section '${section}'`, { section, key });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
