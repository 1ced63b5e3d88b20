import { Module, type ModuleContext } from '../../module/module.js';
import type { ModuleRegistration } from '../../module/module-registry.js';
import { PixelHitMessage } from '../../objects/messages.js';

export interface DetectorCount {
  messages: number;
  hits: number;
  charge: number;
}

const NO_DETECTOR = '<none>';

/**
 * Listens to pixel hits and keeps per-detector totals for the run summary.
 */
export class HitCounter extends Module {
  private counts: Map<string, DetectorCount> = new Map();
  private events = 0;

  constructor(context: ModuleContext) {
    super(context);
    this.config.setDefault('input', '');
    this.messenger.registerListener(this, PixelHitMessage, (message) => this.count(message), {
      channel: this.config.getText('input'),
    });
  }

  async run(): Promise<void> {
    this.events++;
  }

  async finalize(): Promise<void> {
    for (const [detector, count] of this.counts) {
      this.log.info('Hit summary', { detector, events: this.events, ...count });
    }
  }

  getCounts(): Record<string, DetectorCount> {
    return Object.fromEntries(Array.from(this.counts, ([name, count]) => [name, { ...count }]));
  }

  private count(message: PixelHitMessage): void {
    const key = message.detector?.name ?? NO_DETECTOR;
    const current = this.counts.get(key) ?? { messages: 0, hits: 0, charge: 0 };
    this.counts.set(key, {
      messages: current.messages + 1,
      hits: current.hits + message.hits.length,
      charge: current.charge + message.getTotalCharge(),
    });
  }
}

export const hitCounterRegistration: ModuleRegistration = {
  type: 'HitCounter',
  kind: 'unique',
  description: 'Counts pixel hits and collected charge per detector',
  factory: (context) => new HitCounter(context),
};
