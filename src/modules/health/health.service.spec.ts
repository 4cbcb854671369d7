import {
  CircuitBreakerService,
} from '../../core/circuit-breaker/circuit-breaker.service';
import { HealthService } from './health.service';

describe('HealthService', () => {
  const getCircuitBreakerState = jest.fn();
  const breakers = {
    getCircuitBreakerState,
  } as unknown as CircuitBreakerService;
  const service = new HealthService(breakers);

  beforeEach(() => getCircuitBreakerState.mockReset());

  it('reports mail as up before the breaker exists', () => {
    getCircuitBreakerState.mockReturnValue(null);

    expect(service.checkMail()).toEqual({
      mail: { status: 'up', message: 'Circuit breaker not initialized' },
    });
    expect(getCircuitBreakerState).toHaveBeenCalledWith('smtp');
  });

  it('keeps mail up while surfacing an open breaker', () => {
    getCircuitBreakerState.mockReturnValue({
      state: 'open',
      enabled: true,
      failures: 4,
      fires: 5,
    });

    expect(service.checkMail()).toEqual({
      mail: {
        status: 'up',
        state: 'open',
        enabled: true,
        failures: 4,
        fires: 5,
        message: 'SMTP unavailable, mail is skipped',
      },
    });
  });
});
