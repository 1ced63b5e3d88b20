// Public API of simstage

export { Message, WILDCARD_CHANNEL, isValidChannel, type MessageClass } from './messenger/message.js';
export { SingleSlot, MultiSlot, type BindingSlot } from './messenger/slots.js';
export {
  applyDelegate,
  describeDelegate,
  type Delegate,
  type DelegateKind,
  type ListenerDelegate,
  type SingleBindDelegate,
  type MultiBindDelegate,
} from './messenger/delegate.js';
export {
  Messenger,
  type MessageOptions,
  type MessengerEpoch,
  type MessengerStats,
  type OutputDeclaration,
} from './messenger/messenger.js';

export { Module, type ModuleContext, type ModuleKind, type ModuleStatus } from './module/module.js';
export { ModuleRegistry, type ModuleRegistration, type ModuleTypeInfo } from './module/module-registry.js';
export { ModuleManager, type ModuleManagerOptions, type RunSummary } from './module/module-manager.js';
export { findMissingInputs, validateWiring } from './module/wiring-validator.js';

export { Detector, type Position } from './geometry/detector.js';
export { GeometryManager } from './geometry/geometry-manager.js';

export { Configuration, type ConfigScalar, type ConfigValue } from './core/config/configuration.js';
export {
  loadRunConfig,
  parseRunConfig,
  type RunConfig,
  type ModuleEntry,
  type DetectorEntry,
} from './core/config/config-loader.js';
export * from './core/errors.js';
export { logger, SimLogger, ModuleLogger, type LogLevel, type LogEntry, type LoggerConfig } from './core/logger.js';

export { MCTrackMessage, PixelHitMessage } from './objects/messages.js';
export type { MCTrack } from './objects/mc-track.js';
export type { PixelHit, PixelIndex } from './objects/pixel-hit.js';

export * from './modules/index.js';
export { Simulation, type SimulationOverrides, type SimulationResult } from './app/simulation.js';
