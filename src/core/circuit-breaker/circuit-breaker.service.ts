import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import CircuitBreaker from 'opossum';
import { getNumber } from '../config/config.util';
import { logger } from '../logger/logger.config';

export interface CircuitBreakerOptions {
  timeout?: number;
  errorThresholdPercentage?: number;
  resetTimeout?: number;
  name: string;
}

export type CircuitBreakerStateName = 'closed' | 'open' | 'halfOpen';

export interface CircuitBreakerState {
  state: CircuitBreakerStateName;
  enabled: boolean;
  failures: number;
  fires: number;
}

type BreakerStatus = Pick<
  CircuitBreaker,
  'opened' | 'halfOpen' | 'enabled' | 'stats'
>;

@Injectable()
export class CircuitBreakerService {
  private readonly logger = logger();
  private readonly breakers: Map<string, BreakerStatus> = new Map();

  constructor(private readonly configService: ConfigService) {}

  createCircuitBreaker<TArgs extends unknown[], TResult>(
    fn: (...args: TArgs) => Promise<TResult>,
    options: CircuitBreakerOptions,
  ): CircuitBreaker<TArgs, TResult> {
    const { name } = options;
    const timeout =
      options.timeout ??
      getNumber(this.configService, 'CIRCUIT_BREAKER_TIMEOUT', 10000);
    const errorThresholdPercentage =
      options.errorThresholdPercentage ??
      getNumber(this.configService, 'CIRCUIT_BREAKER_ERROR_THRESHOLD', 50);
    const resetTimeout =
      options.resetTimeout ??
      getNumber(this.configService, 'CIRCUIT_BREAKER_RESET_TIMEOUT', 30000);

    const breaker = new CircuitBreaker<TArgs, TResult>(fn, {
      timeout,
      errorThresholdPercentage,
      resetTimeout,
      name,
    });

    breaker.on('open', () => {
      this.logger.warn(
        { circuitBreaker: name, state: 'open' },
        'Circuit breaker opened',
      );
    });

    breaker.on('halfOpen', () => {
      this.logger.info(
        { circuitBreaker: name, state: 'halfOpen' },
        'Circuit breaker half-open',
      );
    });

    breaker.on('close', () => {
      this.logger.info(
        { circuitBreaker: name, state: 'close' },
        'Circuit breaker closed',
      );
    });

    breaker.on('failure', (error: unknown) => {
      this.logger.error(
        {
          circuitBreaker: name,
          error: error instanceof Error ? error.message : String(error),
        },
        'Circuit breaker failure',
      );
    });

    this.breakers.set(name, breaker);
    return breaker;
  }

  getCircuitBreakerState(name: string): CircuitBreakerState | null {
    const breaker = this.breakers.get(name);
    if (!breaker) return null;
    return this.describe(breaker);
  }

  getAllCircuitBreakersState(): Record<string, CircuitBreakerState> {
    const states: Record<string, CircuitBreakerState> = {};
    this.breakers.forEach((breaker, name) => {
      states[name] = this.describe(breaker);
    });
    return states;
  }

  private describe(breaker: BreakerStatus): CircuitBreakerState {
    let state: CircuitBreakerStateName = 'closed';
    if (breaker.opened) {
      state = 'open';
    } else if (breaker.halfOpen) {
      state = 'halfOpen';
    }

    return {
      state,
      enabled: breaker.enabled,
      failures: breaker.stats.failures,
      fires: breaker.stats.fires,
    };
  }
}
