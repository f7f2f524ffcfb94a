import { Logger, MemoryTransport } from "@inktrail/telemetry/logging";
import type { LoadStateCommand, RenderingSurface } from "../session/surface";
import type { AnnotationState, Stroke } from "../types";

export function stroke(seed: number, color = "#ff0000"): Stroke {
  return {
    points: [
      [seed, seed + 1],
      [seed + 2, seed + 3],
    ],
    color,
    thickness: 2,
  };
}

/** State with one stroke per seed, in order. */
export function stateOf(...seeds: number[]): AnnotationState {
  return { strokes: seeds.map((seed) => stroke(seed)) };
}

export class ManualClock {
  constructor(public value = 0) {}

  readonly now = (): number => this.value;

  advance(ms: number): void {
    this.value += ms;
  }
}

/**
 * In-process rendering surface. Loads are recorded and applied when the test
 * calls `apply`.
 */
export class FakeSurface implements RenderingSurface {
  current: AnnotationState;
  readonly loads: LoadStateCommand[] = [];
  requests = 0;
  private held: Array<(state: AnnotationState) => void> = [];
  private holding = false;

  constructor(initial: AnnotationState = { strokes: [] }) {
    this.current = initial;
  }

  requestCurrentState(): Promise<AnnotationState> {
    this.requests += 1;
    if (this.holding) {
      return new Promise((resolve) => {
        this.held.push(resolve);
      });
    }
    return Promise.resolve(structuredClone(this.current));
  }

  loadState(command: LoadStateCommand): void {
    this.loads.push(command);
  }

  /** Shows the most recently commanded state. */
  apply(): number {
    const command = this.loads.at(-1);
    if (!command) {
      throw new Error("No load command to apply");
    }
    this.current = structuredClone(command.state);
    return command.target;
  }

  /** Subsequent state requests stay unanswered until `release`. */
  hold(): void {
    this.holding = true;
  }

  /** Answers new requests again; held ones wait for `release`. */
  resume(): void {
    this.holding = false;
  }

  release(): void {
    this.holding = false;
    const waiting = this.held;
    this.held = [];
    for (const resolve of waiting) {
      resolve(structuredClone(this.current));
    }
  }
}

export function createTestLogger(): { logger: Logger; transport: MemoryTransport } {
  const transport = new MemoryTransport();
  const logger = new Logger({ name: "test", level: "trace", transports: [transport] });
  return { logger, transport };
}
