import type { WeatherConfig } from '../config.js';
import type { SeededRandom } from '../random.js';
import type { Visibility, WeatherState } from '../types.js';

/** 0 = calm … 1 = rough. */
const SEVERITY: Record<WeatherState, number> = { calm: 0, moderate: 0.5, rough: 1 };

const VISIBILITY: Record<WeatherState, Visibility> = { calm: 'good', moderate: 'reduced', rough: 'poor' };

/**
 * Slow-varying weather as a three-state Markov chain.
 * Each step the state holds with probability `persistence`, otherwise it moves
 * one state: calm ↔ moderate ↔ rough.
 */
export class WeatherProcess {
  constructor(
    private current: WeatherState,
    private readonly config: WeatherConfig,
  ) {}

  get state(): WeatherState {
    return this.current;
  }

  get visibility(): Visibility {
    return VISIBILITY[this.current];
  }

  get severity(): number {
    return SEVERITY[this.current];
  }

  /** ≥ 1. Divides approach distances: poor visibility brings units closer. */
  get perturbation(): number {
    return 1 + this.config.perturbation * this.severity;
  }

  /** Per-activity probability of an accident this step. */
  get accidentProbability(): number {
    return this.config.accident_rate * this.severity;
  }

  advance(rng: SeededRandom): WeatherState {
    if (rng.chance(this.config.persistence)) return this.current;
    switch (this.current) {
      case 'calm':
        this.current = 'moderate';
        break;
      case 'rough':
        this.current = 'moderate';
        break;
      case 'moderate':
        this.current = rng.chance(0.5) ? 'calm' : 'rough';
        break;
    }
    return this.current;
  }
}
