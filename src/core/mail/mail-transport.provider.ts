import { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import nodemailer from 'nodemailer';
import { getBoolean, getNumber } from '../config/config.util';
import { MAIL_TRANSPORT, MailTransport } from './mail.constants';

export const mailTransportProvider: Provider = {
  provide: MAIL_TRANSPORT,
  inject: [ConfigService],
  useFactory: (configService: ConfigService): MailTransport => {
    const user = configService.get<string>('MAIL_USER');
    const pass = configService.get<string>('MAIL_PASSWORD');

    return nodemailer.createTransport({
      host: configService.get<string>('MAIL_HOST', 'localhost'),
      port: getNumber(configService, 'MAIL_PORT', 587),
      secure: getBoolean(configService, 'MAIL_SECURE', false),
      auth: user && pass ? { user, pass } : undefined,
    });
  },
};
