// ═══════════════════════════════════════════════════════════════════
// TICKERS - per-frame signals that drive spring observation
//
// A TickSource calls its listeners once per tick. Springs connect while
// they have bound callbacks or pending whenSettled() promises and
// disconnect themselves once settled.
//
//   ManualTicker    host or test calls step()
//   IntervalTicker  timer-driven, only armed while it has listeners
// ═══════════════════════════════════════════════════════════════════

import { TICK_RATE } from '../constants.js';
import { loadConfig } from '../config.js';

export type TickListener = () => void;

export interface TickSource {
  /** Registers a listener; the returned function disconnects it */
  connect(listener: TickListener): () => void;
}

abstract class TickerBase implements TickSource {
  protected readonly listeners = new Set<TickListener>();

  connect(listener: TickListener): () => void {
    this.listeners.add(listener);
    this.onListenersChanged();
    return () => {
      if (this.listeners.delete(listener)) this.onListenersChanged();
    };
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  /** Fires every listener connected at the start of the tick */
  protected fire(): void {
    for (const listener of [...this.listeners]) {
      if (this.listeners.has(listener)) listener();
    }
  }

  protected onListenersChanged(): void {}
}

export class ManualTicker extends TickerBase {
  step(count = 1): void {
    for (let i = 0; i < count; i++) this.fire();
  }
}

export class IntervalTicker extends TickerBase {
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly intervalMs: number;

  constructor(rate = TICK_RATE) {
    super();
    this.intervalMs = 1000 / rate;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  protected override onListenersChanged(): void {
    if (this.listeners.size > 0 && this.timer === null) {
      this.timer = setInterval(() => this.fire(), this.intervalMs);
    } else if (this.listeners.size === 0 && this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}

let defaultTicker: IntervalTicker | null = null;

/** Shared interval ticker used by springs created without one */
export function getDefaultTicker(): IntervalTicker {
  if (!defaultTicker) {
    defaultTicker = new IntervalTicker(loadConfig().tickRate);
  }
  return defaultTicker;
}
