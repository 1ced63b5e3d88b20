/**
 * Simstage Core - Geometry Manager
 *
 * Holds the detectors of the setup and looks them up by name or type.
 */

import { SetupError } from '../core/errors.js';
import type { DetectorEntry } from '../core/config/config-loader.js';
import { Detector } from './detector.js';

export class GeometryManager {
  private detectors: Map<string, Detector> = new Map();

  static fromEntries(entries: DetectorEntry[]): GeometryManager {
    const geometry = new GeometryManager();
    for (const entry of entries) {
      geometry.addDetector(new Detector(entry.name, entry.type, entry.position));
    }
    return geometry;
  }

  addDetector(detector: Detector): void {
    if (this.detectors.has(detector.name)) {
      throw new SetupError(`Detector with name ${detector.name} is already registered`, { detector: detector.name });
    }
    this.detectors.set(detector.name, detector);
  }

  hasDetector(name: string): boolean {
    return this.detectors.has(name);
  }

  getDetectors(): Detector[] {
    return Array.from(this.detectors.values());
  }

  getDetector(name: string): Detector {
    const detector = this.detectors.get(name);
    if (!detector) {
      throw new SetupError(`Detector ${name} not found in geometry`, { detector: name });
    }
    return detector;
  }

  getDetectorsByType(type: string): Detector[] {
    return this.getDetectors().filter(d => d.type === type);
  }
}
