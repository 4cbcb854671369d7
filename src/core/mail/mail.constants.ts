import { Transporter } from 'nodemailer';

export const MAIL_TRANSPORT = Symbol('MAIL_TRANSPORT');
export const SMTP_BREAKER = 'smtp';

export type MailTransport = Pick<Transporter, 'sendMail'>;

export interface OutgoingMail {
  to: string;
  subject: string;
  text: string;
}
