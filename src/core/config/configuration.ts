/**
 * Simstage Core - Configuration
 *
 * Key/value settings of one section (a module, or the simulation itself).
 * Values come from the run configuration YAML; getters validate the shape.
 */

import path from 'path';
import { InvalidValueError, MissingKeyError } from '../errors.js';

export type ConfigScalar = string | number | boolean;
export type ConfigValue = ConfigScalar | ConfigValue[];

export class Configuration {
  private values: Map<string, ConfigValue> = new Map();

  constructor(
    private readonly name: string = '',
    values: Record<string, ConfigValue> = {},
    private readonly baseDir: string = process.cwd()
  ) {
    for (const [key, value] of Object.entries(values)) {
      this.values.set(key, value);
    }
  }

  getName(): string {
    return this.name;
  }

  getBaseDir(): string {
    return this.baseDir;
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  keys(): string[] {
    return Array.from(this.values.keys());
  }

  set(key: string, value: ConfigValue): void {
    this.values.set(key, value);
  }

  setDefault(key: string, value: ConfigValue): void {
    if (!this.has(key)) {
      this.values.set(key, value);
    }
  }

  getText(key: string, def?: string): string {
    const value = this.lookup(key, def);
    if (Array.isArray(value)) {
      throw new InvalidValueError(this.name, key, 'expected a single value, got a list');
    }
    return String(value);
  }

  getNumber(key: string, def?: number): number {
    const value = this.lookup(key, def);
    return this.toNumber(key, value);
  }

  getInteger(key: string, def?: number): number {
    const value = this.getNumber(key, def);
    if (!Number.isInteger(value)) {
      throw new InvalidValueError(this.name, key, `${value} is not an integer`);
    }
    return value;
  }

  getBoolean(key: string, def?: boolean): boolean {
    const value = this.lookup(key, def);
    if (typeof value === 'boolean') return value;
    if (value === 'true') return true;
    if (value === 'false') return false;
    throw new InvalidValueError(this.name, key, `${JSON.stringify(value)} is not a boolean`);
  }

  getArray(key: string, def?: string[]): string[] {
    const value = this.lookup(key, def);
    const items = Array.isArray(value) ? value : [value];
    return items.map(item => {
      if (Array.isArray(item)) {
        throw new InvalidValueError(this.name, key, 'expected a flat list');
      }
      return String(item);
    });
  }

  getNumberArray(key: string, def?: number[]): number[] {
    const value = this.lookup(key, def);
    const items = Array.isArray(value) ? value : [value];
    return items.map(item => this.toNumber(key, item));
  }

  getMatrix(key: string, def?: string[][]): string[][] {
    const value = this.lookup(key, def);
    if (!Array.isArray(value)) {
      throw new InvalidValueError(this.name, key, 'expected a list of lists');
    }
    return value.map(row => {
      if (!Array.isArray(row)) {
        throw new InvalidValueError(this.name, key, 'expected a list of lists');
      }
      return row.map(cell => {
        if (Array.isArray(cell)) {
          throw new InvalidValueError(this.name, key, 'matrix nested deeper than two levels');
        }
        return String(cell);
      });
    });
  }

  /**
   * Resolves a path value against the directory of the file this section was read from.
   */
  getPath(key: string, def?: string): string {
    const value = this.getText(key, def);
    return path.isAbsolute(value) ? value : path.resolve(this.baseDir, value);
  }

  print(): string {
    return Array.from(this.values.entries())
      .map(([key, value]) => `${key} : ${JSON.stringify(value)}`)
      .join('\n');
  }

  toRecord(): Record<string, ConfigValue> {
    return Object.fromEntries(this.values);
  }

  private lookup(key: string, def: ConfigValue | undefined): ConfigValue {
    const value = this.values.get(key);
    if (value !== undefined) {
      return value;
    }
    if (def !== undefined) {
      return def;
    }
    throw new MissingKeyError(this.name, key);
  }

  private toNumber(key: string, value: ConfigValue): number {
    if (typeof value === 'number') return value;
    if (typeof value === 'string' && value.trim() !== '') {
      const parsed = Number(value);
      if (!Number.isNaN(parsed)) return parsed;
    }
    throw new InvalidValueError(this.name, key, `${JSON.stringify(value)} is not a number`);
  }
}
