import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TokenService } from './auth/token.service';
import {
  CircuitBreakerService,
} from './circuit-breaker/circuit-breaker.service';
import { mailTransportProvider } from './mail/mail-transport.provider';
import { MailerService } from './mail/mailer.service';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    CircuitBreakerService,
    TokenService,
    mailTransportProvider,
    MailerService,
  ],
  exports: [CircuitBreakerService, TokenService, MailerService],
})
export class CoreModule {}
