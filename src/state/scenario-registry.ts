import { EventEmitter } from 'node:events';
import { ConfigurationError } from '../errors';

export type ScenarioLookup = {
  findScenarioByName(name: string): Promise<{ name: string } | undefined>;
};

export type RegistrySnapshot = {
  name?: string;
  epoch: number;
};

/**
 * Which scenario is active and how often each of its mocks has been hit.
 *
 * Every mutation of the active name and the counters happens in one synchronous
 * step, so a concurrent `execute` sees either the state before a switch or the
 * state after it. The epoch changes on every switch; matches recorded against an
 * older epoch are dropped.
 */
export class ScenarioRegistry extends EventEmitter {
  private current?: string;
  private epoch = 0;
  private counts = new Map<number, number>();
  private pending: Promise<unknown> = Promise.resolve();

  constructor(private readonly lookup: ScenarioLookup) {
    super();
  }

  public active(): string | undefined {
    return this.current;
  }

  public snapshot(): RegistrySnapshot {
    return { name: this.current, epoch: this.epoch };
  }

  /** Switches run in call order even when the existence check is slow. */
  public activate(name: string): Promise<void> {
    return this.enqueue(async () => {
      const scenario = await this.lookup.findScenarioByName(name);
      if (!scenario) {
        throw new ConfigurationError(`Scenario not found: ${name}`, 'scenario');
      }
      this.switchTo(scenario.name);
    });
  }

  public deactivate(): Promise<void> {
    return this.enqueue(async () => {
      this.switchTo(undefined);
    });
  }

  public recordMatch(requestId: number, epoch = this.epoch): boolean {
    if (epoch !== this.epoch) {
      return false;
    }
    this.counts.set(requestId, (this.counts.get(requestId) ?? 0) + 1);
    return true;
  }

  public matchCount(requestId: number): number {
    return this.counts.get(requestId) ?? 0;
  }

  public matchCounts(): Map<number, number> {
    return new Map(this.counts);
  }

  private enqueue(step: () => Promise<void>): Promise<void> {
    const next = this.pending.then(step);
    this.pending = next.catch(() => undefined);
    return next;
  }

  private switchTo(next: string | undefined): void {
    this.current = next;
    this.counts = new Map();
    this.epoch += 1;
    this.emit('change', this.current);
  }
}
