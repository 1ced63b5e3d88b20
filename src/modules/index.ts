import { ModuleRegistry } from '../module/module-registry.js';
import { hitCounterRegistration } from './hit-counter/index.js';
import { hitGeneratorRegistration } from './hit-generator/index.js';
import { hitWriterRegistration } from './hit-writer/index.js';
import { particleSourceRegistration } from './particle-source/index.js';

export { ParticleSource } from './particle-source/index.js';
export { HitGenerator } from './hit-generator/index.js';
export { HitCounter, type DetectorCount } from './hit-counter/index.js';
export { HitWriter, type EventRecord } from './hit-writer/index.js';

export const BUILTIN_MODULES = [
  particleSourceRegistration,
  hitGeneratorRegistration,
  hitCounterRegistration,
  hitWriterRegistration,
];

export function createDefaultRegistry(): ModuleRegistry {
  const registry = new ModuleRegistry();
  for (const registration of BUILTIN_MODULES) {
    registry.register(registration);
  }
  return registry;
}
