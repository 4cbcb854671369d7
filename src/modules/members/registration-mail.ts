import { OutgoingMail } from '../../core/mail/mail.constants';
import { Member } from './entities/member.entity';
import { Package } from '../packages/entities/package.entity';

const priceFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 0,
  maximumFractionDigits: 2,
});

export const formatPrice = (amount: number): string =>
  priceFormat.format(amount);

export const buildRegistrationMail = (
  gymName: string,
  member: Pick<Member, 'fullName' | 'email' | 'activeUntil'>,
  pkg: Pick<Package, 'name' | 'price'>,
): OutgoingMail => ({
  to: member.email,
  subject: `Registration confirmed - ${gymName}`,
  text: [
    `Hello ${member.fullName},`,
    '',
    `You are now registered at ${gymName}.`,
    '',
    `- Package: ${pkg.name}`,
    `- Price: ${formatPrice(pkg.price)}`,
    `- Valid until: ${member.activeUntil ?? 'not activated'}`,
    '',
    `Thank you for choosing ${gymName}!`,
  ].join('\n'),
});
