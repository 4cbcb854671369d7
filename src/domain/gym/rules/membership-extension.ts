import { Injectable } from '@nestjs/common';
import { InvalidDurationError } from '../errors';
import {
  addMonthsClamped,
  IsoDate,
  todayIsoDate,
} from '../utils/calendar.util';

@Injectable()
export class MembershipExtension {
  /**
   * Computes a member's new active-until date after buying a package.
   *
   * Time is added on top of a membership that is still running (expiry today
   * or later); a lapsed or never-activated membership starts from today.
   */
  extend(
    currentActiveUntil: IsoDate | null | undefined,
    durationMonths: number,
    today: IsoDate = todayIsoDate(),
  ): IsoDate {
    if (!Number.isInteger(durationMonths) || durationMonths < 1) {
      throw new InvalidDurationError(durationMonths);
    }

    const anchor = this.anchorDate(currentActiveUntil, today);
    return addMonthsClamped(anchor, durationMonths);
  }

  anchorDate(
    currentActiveUntil: IsoDate | null | undefined,
    today: IsoDate,
  ): IsoDate {
    if (currentActiveUntil && currentActiveUntil >= today) {
      return currentActiveUntil;
    }
    return today;
  }

  isActive(
    activeUntil: IsoDate | null | undefined,
    today: IsoDate = todayIsoDate(),
  ): boolean {
    return !!activeUntil && activeUntil >= today;
  }
}
