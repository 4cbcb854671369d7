import { ConfigService } from '@nestjs/config';
import CircuitBreaker from 'opossum';
import { CircuitBreakerService } from './circuit-breaker.service';

describe('CircuitBreakerService', () => {
  const configService = { get: jest.fn(() => undefined) };
  let service: CircuitBreakerService;
  let breaker: CircuitBreaker<[number], number> | undefined;

  beforeEach(() => {
    service = new CircuitBreakerService(
      configService as unknown as ConfigService,
    );
  });

  afterEach(() => {
    breaker?.shutdown();
    breaker = undefined;
  });

  it('returns null for a breaker that was never created', () => {
    expect(service.getCircuitBreakerState('smtp')).toBeNull();
  });

  it('reports the state and counters of a breaker', async () => {
    breaker = service.createCircuitBreaker(
      async (value: number) => value * 2,
      { name: 'smtp' },
    );

    await expect(breaker.fire(21)).resolves.toBe(42);

    expect(service.getCircuitBreakerState('smtp')).toEqual({
      state: 'closed',
      enabled: true,
      failures: 0,
      fires: 1,
    });
  });

  it('shows an opened breaker', () => {
    breaker = service.createCircuitBreaker(
      async (value: number) => value,
      { name: 'smtp' },
    );
    breaker.open();

    expect(service.getAllCircuitBreakersState()).toEqual({
      smtp: { state: 'open', enabled: true, failures: 0, fires: 0 },
    });
  });
});
