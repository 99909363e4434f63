export interface TuningSnapshot {
  description: string;
  energy: number;
  directions: string[];
}

export interface EnergyBounds {
  min: number;
  max: number;
}

export type DialDirection = 'up' | 'down';

export const DEFAULT_MAX_ENERGY = 2;

function clamp(value: number, bounds: EnergyBounds): number {
  return Math.min(bounds.max, Math.max(bounds.min, value));
}

/**
 * Live radio tuning. `directions[0]` is the description the station started
 * with; every tune appends.
 */
export class Tuning {
  private constructor(
    private description: string,
    private energy: number,
    private readonly directions: string[],
    readonly bounds: EnergyBounds,
  ) {}

  static start(description: string, maxEnergy = DEFAULT_MAX_ENERGY): Tuning {
    return new Tuning(description, 0, [description], { min: -maxEnergy, max: maxEnergy });
  }

  /** Energy outside the configured range is clamped. */
  static fromSnapshot(snapshot: TuningSnapshot, maxEnergy = DEFAULT_MAX_ENERGY): Tuning {
    const bounds = { min: -maxEnergy, max: maxEnergy };
    const directions = snapshot.directions.length > 0 ? [...snapshot.directions] : [snapshot.description];
    return new Tuning(snapshot.description, clamp(Math.round(snapshot.energy), bounds), directions, bounds);
  }

  tune(direction: string): void {
    this.directions.push(direction);
    this.description = direction;
  }

  /** Returns false when the energy was already at the bound. */
  dial(direction: DialDirection): boolean {
    const next = clamp(this.energy + (direction === 'up' ? 1 : -1), this.bounds);
    const changed = next !== this.energy;
    this.energy = next;
    return changed;
  }

  get currentDescription(): string {
    return this.description;
  }

  get currentEnergy(): number {
    return this.energy;
  }

  get directionHistory(): readonly string[] {
    return this.directions;
  }

  snapshot(): TuningSnapshot {
    return { description: this.description, energy: this.energy, directions: [...this.directions] };
  }
}
