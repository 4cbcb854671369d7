import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import CircuitBreaker from 'opossum';
import {
  CircuitBreakerService,
} from '../circuit-breaker/circuit-breaker.service';
import { getNumber } from '../config/config.util';
import { logger } from '../logger/logger.config';
import {
  MAIL_TRANSPORT,
  MailTransport,
  OutgoingMail,
  SMTP_BREAKER,
} from './mail.constants';

@Injectable()
export class MailerService {
  private readonly logger = logger();
  private readonly from: string;
  private readonly breaker: CircuitBreaker<[OutgoingMail], string>;

  constructor(
    @Inject(MAIL_TRANSPORT) private readonly transport: MailTransport,
    private readonly configService: ConfigService,
    circuitBreakerService: CircuitBreakerService,
  ) {
    this.from = this.configService.get<string>(
      'MAIL_FROM',
      'no-reply@gym.local',
    );
    this.breaker = circuitBreakerService.createCircuitBreaker(
      (mail: OutgoingMail) => this.deliver(mail),
      {
        name: SMTP_BREAKER,
        timeout: getNumber(this.configService, 'MAIL_TIMEOUT_MS', 10000),
      },
    );
  }

  /**
   * Sends a message without ever failing the caller: delivery problems are
   * logged and reported as `false`.
   */
  async send(mail: OutgoingMail): Promise<boolean> {
    try {
      const messageId = await this.breaker.fire(mail);
      this.logger.info({ to: mail.to, messageId }, 'Mail sent');
      return true;
    } catch (error: unknown) {
      this.logger.warn(
        {
          to: mail.to,
          subject: mail.subject,
          error: error instanceof Error ? error.message : String(error),
        },
        'Mail delivery failed',
      );
      return false;
    }
  }

  private async deliver(mail: OutgoingMail): Promise<string> {
    const info = await this.transport.sendMail({
      from: this.from,
      to: mail.to,
      subject: mail.subject,
      text: mail.text,
    });
    return String(info.messageId);
  }
}
