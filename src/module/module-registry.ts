import { SetupError } from '../core/errors.js';
import type { Module, ModuleContext, ModuleKind } from './module.js';

export interface ModuleRegistration {
  type: string;
  kind: ModuleKind;
  description: string;
  factory: (context: ModuleContext) => Module;
}

export interface ModuleTypeInfo {
  type: string;
  kind: ModuleKind;
  description: string;
}

/**
 * Module factories by type name
 */
export class ModuleRegistry {
  private registrations: Map<string, ModuleRegistration> = new Map();

  register(registration: ModuleRegistration): void {
    if (this.registrations.has(registration.type)) {
      throw new SetupError(`Module type ${registration.type} already registered`, { type: registration.type });
    }
    this.registrations.set(registration.type, registration);
  }

  has(type: string): boolean {
    return this.registrations.has(type);
  }

  get(type: string): ModuleRegistration {
    const reg = this.registrations.get(type);
    if (!reg) {
      throw new SetupError(`Module type ${type} not registered`, {
        type,
        available: this.getRegisteredTypes(),
      });
    }
    return reg;
  }

  create(type: string, context: ModuleContext): Module {
    const reg = this.get(type);
    if (reg.kind === 'detector' && !context.detector) {
      throw new SetupError(`Module ${type} is a detector module and needs a detector`, { type });
    }
    return reg.factory(context);
  }

  getRegisteredTypes(): string[] {
    return Array.from(this.registrations.keys());
  }

  describe(): ModuleTypeInfo[] {
    return Array.from(this.registrations.values()).map(({ type, kind, description }) => ({ type, kind, description }));
  }
}
