import { Injectable } from '@nestjs/common';
import { HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import {
  CircuitBreakerService,
} from '../../core/circuit-breaker/circuit-breaker.service';
import { SMTP_BREAKER } from '../../core/mail/mail.constants';

@Injectable()
export class HealthService extends HealthIndicator {
  constructor(private readonly circuitBreakerService: CircuitBreakerService) {
    super();
  }

  /**
   * Mail is best-effort, so an open breaker is reported but never marks the
   * service down.
   */
  checkMail(): HealthIndicatorResult {
    const state =
      this.circuitBreakerService.getCircuitBreakerState(SMTP_BREAKER);
    if (!state) {
      return this.getStatus('mail', true, {
        message: 'Circuit breaker not initialized',
      });
    }

    return this.getStatus('mail', true, {
      state: state.state,
      enabled: state.enabled,
      failures: state.failures,
      fires: state.fires,
      message:
        state.state === 'open'
          ? 'SMTP unavailable, mail is skipped'
          : 'SMTP OK',
    });
  }
}
